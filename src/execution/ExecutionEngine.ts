/**
 * Execution Engine
 *
 * Sequences exchange operations for each trading intent:
 *   open:  cancel stale orders → set leverage → resolve market → price →
 *          record position → IOC order
 *   close: resolve size → resolve market → price → record position →
 *          reduce-only IOC → cancel leftovers
 *   protective: reduce-only trigger order on the opposite side
 *
 * Every public workflow holds a per-symbol lock for its whole duration.
 * Nothing is retried and nothing is rolled back: a leverage change stays in
 * place if the following order submission fails.
 */

import Decimal from 'decimal.js';
import EventEmitter from 'eventemitter3';
import { logger, errorMessage } from '../logger.js';
import type { AccountSnapshotReader } from '../account/AccountSnapshotReader.js';
import type { AccountSnapshot, Position, PositionSide } from '../account/types.js';
import type { NumericCodec } from '../codec/NumericCodec.js';
import type {
  ExchangeDataClient,
  MarginMode,
  OrderBookDetail,
  OrderIntent,
  OrderSigner,
  OrderType,
} from '../exchange/types.js';
import type { MarketMetadataCache } from '../market/MarketMetadataCache.js';
import type { MarketInfo } from '../market/types.js';
import {
  ExecutionError,
  InvalidRequestError,
  LeverageSetFailedError,
  NoPositionToCloseError,
  OrderSubmissionFailedError,
  PriceUnavailableError,
} from './errors.js';
import { SymbolLock } from './SymbolLock.js';
import type {
  ExecutionEngineConfig,
  ExecutionEvents,
  OrderOutcome,
  Reconciliation,
  WorkflowResult,
  WorkflowWarning,
} from './types.js';

/** Initial margin fraction is expressed in basis points: 10x -> 1000 */
const IMF_SCALE = 10000;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ExecutionEngineDeps {
  signer: OrderSigner;
  dataClient: Pick<ExchangeDataClient, 'getOrderBookDetail'>;
  markets: MarketMetadataCache;
  codec: NumericCodec;
  account: AccountSnapshotReader;
}

export class ExecutionEngine extends EventEmitter<ExecutionEvents> {
  private readonly config: ExecutionEngineConfig;
  private readonly signer: OrderSigner;
  private readonly dataClient: Pick<ExchangeDataClient, 'getOrderBookDetail'>;
  private readonly markets: MarketMetadataCache;
  private readonly codec: NumericCodec;
  private readonly account: AccountSnapshotReader;
  private readonly locks = new SymbolLock();
  private readonly marginModes = new Map<string, MarginMode>();
  private lastClientOrderIndex = 0;

  constructor(config: ExecutionEngineConfig, deps: ExecutionEngineDeps) {
    super();
    if (!(config.slippage >= 0 && config.slippage < 1)) {
      throw new Error(`slippage must be in [0, 1), got ${config.slippage}`);
    }
    this.config = config;
    this.signer = deps.signer;
    this.dataClient = deps.dataClient;
    this.markets = deps.markets;
    this.codec = deps.codec;
    this.account = deps.account;

    logger.info('Execution Engine initialized', {
      slippage: config.slippage,
      protectiveOrderExpiryDays: config.protectiveOrderExpiryDays,
      defaultMarginMode: config.defaultMarginMode,
    });
  }

  // ===========================================
  // Account queries
  // ===========================================

  getBalance(): Promise<AccountSnapshot> {
    return this.account.getBalance();
  }

  getPositions(): Promise<Position[]> {
    return this.account.getPositions();
  }

  formatQuantity(symbol: string, quantity: number): string {
    return this.codec.formatQuantity(symbol, quantity);
  }

  /**
   * Mark price, or the mid of best bid/ask when no mark price is published
   */
  async getMarketPrice(symbol: string): Promise<number> {
    const market = await this.markets.lookup(symbol);
    return this.fetchPrice(symbol, market);
  }

  // ===========================================
  // Opening and closing
  // ===========================================

  openLong(symbol: string, quantity: number, leverage: number): Promise<WorkflowResult> {
    return this.open(symbol, 'long', quantity, leverage);
  }

  openShort(symbol: string, quantity: number, leverage: number): Promise<WorkflowResult> {
    return this.open(symbol, 'short', quantity, leverage);
  }

  /**
   * Close a long; quantity 0 closes the whole current position
   */
  closeLong(symbol: string, quantity: number): Promise<WorkflowResult> {
    return this.close(symbol, 'long', quantity);
  }

  /**
   * Close a short; quantity 0 closes the whole current position
   */
  closeShort(symbol: string, quantity: number): Promise<WorkflowResult> {
    return this.close(symbol, 'short', quantity);
  }

  // ===========================================
  // Protective orders
  // ===========================================

  setStopLoss(
    symbol: string,
    positionSide: PositionSide,
    quantity: number,
    stopPrice: number
  ): Promise<WorkflowResult> {
    return this.placeProtectiveOrder('stopLoss', symbol, positionSide, quantity, stopPrice);
  }

  setTakeProfit(
    symbol: string,
    positionSide: PositionSide,
    quantity: number,
    takeProfitPrice: number
  ): Promise<WorkflowResult> {
    return this.placeProtectiveOrder('takeProfit', symbol, positionSide, quantity, takeProfitPrice);
  }

  // ===========================================
  // Account settings
  // ===========================================

  /**
   * Set leverage for a symbol, resolving to the submission handle
   */
  setLeverage(symbol: string, leverage: number): Promise<string> {
    return this.runWorkflow(symbol, () => this.applyLeverage(symbol, leverage));
  }

  /**
   * Margin mode used by subsequent leverage updates on this symbol
   */
  setMarginMode(symbol: string, isCrossMargin: boolean): void {
    const mode: MarginMode = isCrossMargin ? 'cross' : 'isolated';
    this.marginModes.set(symbol, mode);
    logger.info('Margin mode recorded, applied with next leverage update', { symbol, mode });
  }

  /**
   * Cancel all open orders, resolving to the submission handle
   */
  cancelAllOrders(symbol: string): Promise<string> {
    return this.runWorkflow(symbol, async () => {
      try {
        const handle = await this.signer.cancelAllOrders(symbol, Date.now());
        logger.info('All open orders cancelled', { symbol, handle });
        return handle;
      } catch (error) {
        throw new OrderSubmissionFailedError(symbol, error);
      }
    });
  }

  /**
   * Re-query positions and compare the side's amount with the amount held
   * right before submission. An open is confirmed once the position grew by
   * the order size; a close once it shrank by the order size or is gone.
   */
  async reconcile(result: WorkflowResult): Promise<Reconciliation> {
    const { symbol } = result.outcome;
    if (result.action !== 'open' && result.action !== 'close') {
      throw new InvalidRequestError(
        `Cannot reconcile a ${result.action} order against positions`,
        symbol
      );
    }
    if (result.positionBefore === undefined) {
      throw new InvalidRequestError(
        `No position was recorded before order ${result.outcome.clientOrderIndex} was submitted`,
        symbol
      );
    }

    const position = await this.account.findPosition(symbol, result.side);
    const positionBefore = result.positionBefore;
    const positionAfter = position?.amount ?? 0;

    const change =
      result.action === 'open'
        ? new Decimal(positionAfter).minus(positionBefore)
        : new Decimal(positionBefore).minus(positionAfter);
    const filledAmount = Decimal.max(change, 0).toNumber();
    const confirmed =
      change.gte(result.quantity) ||
      (result.action === 'close' && positionBefore > 0 && positionAfter === 0);

    logger.debug('Order reconciled', {
      symbol,
      action: result.action,
      clientOrderIndex: result.outcome.clientOrderIndex,
      positionBefore,
      positionAfter,
      confirmed,
    });

    return {
      symbol,
      side: result.side,
      confirmed,
      filledAmount,
      positionBefore,
      positionAfter,
      position,
    };
  }

  // ===========================================
  // Workflows
  // ===========================================

  private open(
    symbol: string,
    side: PositionSide,
    quantity: number,
    leverage: number
  ): Promise<WorkflowResult> {
    return this.runWorkflow(symbol, async (warnings) => {
      this.assertPositive(symbol, 'quantity', quantity);
      this.assertLeverage(symbol, leverage);

      await this.cancelBestEffort(symbol, 'cancelStaleOrders', warnings);
      await this.applyLeverage(symbol, leverage);

      const market = await this.markets.lookup(symbol);
      const price = await this.fetchPrice(symbol, market);

      // Buy above / sell below the market so the IOC limit fills at once
      const isAsk = side === 'short';
      const intent = this.buildIntent(market, symbol, {
        quantity,
        price: this.offsetPrice(price, isAsk),
        isAsk,
        reduceOnly: false,
        orderType: 'limit',
      });

      const positionBefore = await this.recordPosition(symbol, side, warnings);
      const outcome = await this.submit(intent);
      return {
        action: 'open',
        side,
        outcome,
        intent,
        quantity: this.codec.decodeSize(market, intent.rawQuantity),
        positionBefore,
        warnings,
      };
    });
  }

  private close(symbol: string, side: PositionSide, quantity: number): Promise<WorkflowResult> {
    return this.runWorkflow(symbol, async (warnings) => {
      if (quantity !== 0) {
        this.assertPositive(symbol, 'quantity', quantity);
      }

      let amount = quantity;
      let positionBefore: number | undefined;
      if (amount === 0) {
        const position = await this.account.findPosition(symbol, side);
        if (!position) {
          throw new NoPositionToCloseError(symbol, side);
        }
        amount = position.amount;
        positionBefore = position.amount;
      }

      const market = await this.markets.lookup(symbol);
      const price = await this.fetchPrice(symbol, market);

      const isAsk = side === 'long';
      const intent = this.buildIntent(market, symbol, {
        quantity: amount,
        price: this.offsetPrice(price, isAsk),
        isAsk,
        reduceOnly: true,
        orderType: 'limit',
      });

      if (positionBefore === undefined) {
        positionBefore = await this.recordPosition(symbol, side, warnings);
      }

      let outcome: OrderOutcome;
      try {
        outcome = await this.submit(intent);
      } finally {
        // Leftover protective orders belong to the position being closed
        await this.cancelBestEffort(symbol, 'cancelRemainingOrders', warnings);
      }

      return {
        action: 'close',
        side,
        outcome,
        intent,
        quantity: this.codec.decodeSize(market, intent.rawQuantity),
        positionBefore,
        warnings,
      };
    });
  }

  private placeProtectiveOrder(
    kind: 'stopLoss' | 'takeProfit',
    symbol: string,
    positionSide: PositionSide,
    quantity: number,
    triggerPrice: number
  ): Promise<WorkflowResult> {
    return this.runWorkflow(symbol, async (warnings) => {
      this.assertPositive(symbol, 'quantity', quantity);
      this.assertPositive(symbol, 'price', triggerPrice);

      const market = await this.markets.lookup(symbol);
      const intent = this.buildIntent(market, symbol, {
        quantity,
        price: triggerPrice,
        isAsk: positionSide === 'long',
        reduceOnly: true,
        orderType: kind,
        triggerPrice,
        expiry: Date.now() + this.config.protectiveOrderExpiryDays * DAY_MS,
      });

      const outcome = await this.submit(intent);
      logger.info(kind === 'stopLoss' ? 'Stop loss placed' : 'Take profit placed', {
        symbol,
        positionSide,
        price: triggerPrice,
        handle: outcome.submissionHandle,
      });

      return {
        action: kind,
        side: positionSide,
        outcome,
        intent,
        quantity: this.codec.decodeSize(market, intent.rawQuantity),
        warnings,
      };
    });
  }

  // ===========================================
  // Steps
  // ===========================================

  /**
   * Run a workflow under the symbol lock, logging and emitting failures
   */
  private runWorkflow<T>(
    symbol: string,
    body: (warnings: WorkflowWarning[]) => Promise<T>
  ): Promise<T> {
    // "ETH" and "ETHUSDT" are the same market
    return this.locks.run(this.markets.toCoin(symbol), async () => {
      const warnings: WorkflowWarning[] = [];
      try {
        return await body(warnings);
      } catch (error) {
        const normalizedError = error instanceof Error ? error : new Error(String(error));
        if (normalizedError instanceof ExecutionError) {
          normalizedError.warnings.push(...warnings);
        }
        logger.error('Execution workflow failed', {
          symbol,
          code: normalizedError instanceof ExecutionError ? normalizedError.code : undefined,
          error: normalizedError.message,
        });
        this.emit('orderFailed', symbol, normalizedError);
        throw normalizedError;
      }
    });
  }

  private async applyLeverage(symbol: string, leverage: number): Promise<string> {
    this.assertLeverage(symbol, leverage);

    const market = await this.markets.lookup(symbol);
    const initialMarginFraction = Math.floor(IMF_SCALE / leverage);
    const marginMode = this.marginModes.get(symbol) ?? this.config.defaultMarginMode;

    let handle: string;
    try {
      handle = await this.signer.updateLeverage(market.marketIndex, initialMarginFraction, marginMode);
    } catch (error) {
      throw new LeverageSetFailedError(symbol, leverage, error);
    }

    logger.info('Leverage set', { symbol, leverage, initialMarginFraction, marginMode, handle });
    this.emit('leverageSet', symbol, leverage, initialMarginFraction);
    return handle;
  }

  private async cancelBestEffort(
    symbol: string,
    step: WorkflowWarning['step'],
    warnings: WorkflowWarning[]
  ): Promise<void> {
    try {
      const handle = await this.signer.cancelAllOrders(symbol, Date.now());
      logger.info('All open orders cancelled', { symbol, step, handle });
    } catch (error) {
      this.addWarning(warnings, step, symbol, error, 'Order cancellation failed, continuing');
    }
  }

  /**
   * Amount held on a side right before submission, the baseline for
   * reconcile(). An unreadable account leaves it undefined.
   */
  private async recordPosition(
    symbol: string,
    side: PositionSide,
    warnings: WorkflowWarning[]
  ): Promise<number | undefined> {
    try {
      const position = await this.account.findPosition(symbol, side);
      return position?.amount ?? 0;
    } catch (error) {
      this.addWarning(warnings, 'recordPosition', symbol, error, 'Position read failed, continuing');
      return undefined;
    }
  }

  private addWarning(
    warnings: WorkflowWarning[],
    step: WorkflowWarning['step'],
    symbol: string,
    error: unknown,
    logMessage: string
  ): void {
    const warning: WorkflowWarning = {
      step,
      symbol,
      message: errorMessage(error),
      timestamp: Date.now(),
    };
    warnings.push(warning);
    logger.warn(logMessage, { ...warning });
    this.emit('warning', warning);
  }

  private async fetchPrice(symbol: string, market: MarketInfo): Promise<number> {
    let detail: OrderBookDetail;
    try {
      detail = await this.dataClient.getOrderBookDetail(market.marketIndex);
    } catch (error) {
      throw new PriceUnavailableError(symbol, error);
    }

    if (detail.markPrice !== undefined && detail.markPrice > 0) {
      return detail.markPrice;
    }

    const { bestAsk, bestBid } = detail;
    if (bestAsk !== undefined && bestBid !== undefined && bestAsk > 0 && bestBid > 0) {
      return new Decimal(bestAsk).plus(bestBid).div(2).toNumber();
    }

    throw new PriceUnavailableError(symbol);
  }

  /**
   * Price moved against the order by the configured slippage
   */
  private offsetPrice(price: number, isAsk: boolean): number {
    const factor = isAsk ? 1 - this.config.slippage : 1 + this.config.slippage;
    return new Decimal(price).times(factor).toNumber();
  }

  private buildIntent(
    market: MarketInfo,
    symbol: string,
    order: {
      quantity: number;
      price: number;
      isAsk: boolean;
      reduceOnly: boolean;
      orderType: OrderType;
      triggerPrice?: number;
      expiry?: number;
    }
  ): OrderIntent {
    // Decimals come from the market resolved by this workflow, not a
    // fresh cache read that a concurrent reload may have replaced
    const rawQuantity = this.codec.encodeSize(market, order.quantity);
    if (rawQuantity <= 0) {
      throw new InvalidRequestError(
        `Quantity ${order.quantity} is below the minimum size increment`,
        symbol
      );
    }

    return {
      symbol,
      marketIndex: market.marketIndex,
      clientOrderIndex: this.nextClientOrderIndex(),
      rawQuantity,
      limitPrice: this.codec.encodePrice(market, order.price),
      isAsk: order.isAsk,
      reduceOnly: order.reduceOnly,
      orderType: order.orderType,
      timeInForce: 'ioc',
      triggerPrice:
        order.triggerPrice === undefined
          ? undefined
          : this.codec.encodePrice(market, order.triggerPrice),
      expiry: order.expiry,
    };
  }

  private async submit(intent: OrderIntent): Promise<OrderOutcome> {
    logger.info('Submitting order', {
      symbol: intent.symbol,
      orderType: intent.orderType,
      isAsk: intent.isAsk,
      reduceOnly: intent.reduceOnly,
      rawQuantity: intent.rawQuantity,
      limitPrice: intent.limitPrice,
    });

    let handle: string;
    try {
      handle = await this.signer.createOrder(intent);
    } catch (error) {
      throw new OrderSubmissionFailedError(intent.symbol, error);
    }

    const outcome: OrderOutcome = {
      clientOrderIndex: intent.clientOrderIndex,
      symbol: intent.symbol,
      status: 'submitted',
      fill: 'unconfirmed',
      submissionHandle: handle,
      submittedAt: Date.now(),
    };

    logger.info('Order submitted', {
      symbol: intent.symbol,
      clientOrderIndex: outcome.clientOrderIndex,
      handle,
    });
    this.emit('orderSubmitted', outcome, intent);
    return outcome;
  }

  /**
   * Millisecond timestamp, bumped so indices never repeat
   */
  private nextClientOrderIndex(): number {
    this.lastClientOrderIndex = Math.max(Date.now(), this.lastClientOrderIndex + 1);
    return this.lastClientOrderIndex;
  }

  private assertLeverage(symbol: string, leverage: number): void {
    if (!Number.isFinite(leverage) || leverage < 1 || leverage > IMF_SCALE) {
      throw new InvalidRequestError(`Leverage must be between 1 and ${IMF_SCALE}, got ${leverage}`, symbol);
    }
  }

  private assertPositive(symbol: string, field: 'quantity' | 'price', value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
      throw new InvalidRequestError(`${field} must be a positive number, got ${value}`, symbol);
    }
  }
}
