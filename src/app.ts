/**
 * Application
 *
 * Wires the engine from configuration:
 * Data Client → Market Metadata Cache → Numeric Codec / Account Reader → Execution Engine
 */

import { logger, errorMessage } from './logger.js';
import { config as defaultConfig, type Config } from './config.js';
import { AccountSnapshotReader } from './account/index.js';
import { NumericCodec } from './codec/index.js';
import { DryRunSigner, LighterDataClient } from './exchange/index.js';
import type { ExchangeDataClient, OrderSigner } from './exchange/index.js';
import { ExecutionEngine } from './execution/index.js';
import { MarketMetadataCache } from './market/index.js';

export interface AppOptions {
  /** Real signer; required when execution is enabled */
  signer?: OrderSigner;

  /** Defaults to a LighterDataClient on the configured endpoint */
  dataClient?: ExchangeDataClient;

  settings?: Config;
}

export class App {
  readonly dataClient: ExchangeDataClient;
  readonly signer: OrderSigner;
  readonly markets: MarketMetadataCache;
  readonly codec: NumericCodec;
  readonly account: AccountSnapshotReader;
  readonly engine: ExecutionEngine;

  constructor(options: AppOptions = {}) {
    const settings = options.settings ?? defaultConfig;

    this.dataClient =
      options.dataClient ??
      new LighterDataClient({
        endpoint: settings.lighter.endpoint,
        requestTimeoutMs: settings.lighter.requestTimeoutMs,
      });

    // Kill switch: nothing is signed unless execution is enabled
    if (settings.execution.enabled) {
      if (!options.signer) {
        throw new Error('Execution is enabled but no OrderSigner was provided');
      }
      this.signer = options.signer;
    } else {
      if (options.signer) {
        logger.warn('Execution disabled, ignoring provided signer and using dry-run');
      }
      this.signer = new DryRunSigner();
    }

    this.markets = new MarketMetadataCache(
      { quoteSuffix: settings.execution.quoteSuffix },
      this.dataClient
    );

    this.codec = new NumericCodec(
      {
        fallbackDecimals: settings.execution.fallbackDecimals,
        strictPrecision: settings.execution.strictPrecision,
      },
      this.markets
    );

    this.account = new AccountSnapshotReader(
      { accountIndex: settings.lighter.accountIndex },
      this.dataClient,
      this.markets
    );

    this.engine = new ExecutionEngine(
      {
        slippage: settings.execution.slippage,
        protectiveOrderExpiryDays: settings.execution.protectiveOrderExpiryDays,
        defaultMarginMode: settings.execution.defaultMarginMode,
      },
      {
        signer: this.signer,
        dataClient: this.dataClient,
        markets: this.markets,
        codec: this.codec,
        account: this.account,
      }
    );

    logger.info('Application initialized', {
      endpoint: settings.lighter.endpoint,
      accountIndex: settings.lighter.accountIndex,
      executionEnabled: settings.execution.enabled,
    });
  }

  /**
   * Warm the market metadata cache. A failure is not fatal: lookups
   * reload on demand.
   */
  async start(): Promise<boolean> {
    try {
      const count = await this.markets.reload();
      logger.info('Application started', { markets: count });
      return true;
    } catch (error) {
      logger.warn('Initial market metadata load failed, continuing', {
        error: errorMessage(error),
      });
      return false;
    }
  }
}
