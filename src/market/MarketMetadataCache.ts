/**
 * Market Metadata Cache
 *
 * Holds per-coin market metadata (market index, size/price decimals).
 * A reload fetches the whole listing, builds a new map and publishes it with
 * a single reference swap, so readers only ever see a complete snapshot and
 * delisted markets disappear. A failed reload keeps the previous snapshot.
 */

import EventEmitter from 'eventemitter3';
import { logger, errorMessage } from '../logger.js';
import { MarketNotFoundError } from '../execution/errors.js';
import type { ExchangeDataClient } from '../exchange/types.js';
import type {
  MarketInfo,
  MarketMetadataCacheConfig,
  MarketMetadataEvents,
} from './types.js';

export class MarketMetadataCache extends EventEmitter<MarketMetadataEvents> {
  private readonly config: MarketMetadataCacheConfig;
  private readonly dataClient: Pick<ExchangeDataClient, 'listMarkets'>;
  private snapshot: ReadonlyMap<string, MarketInfo> = new Map();
  private inflightReload: Promise<number> | null = null;
  private reloadedAt: number | null = null;

  constructor(
    config: MarketMetadataCacheConfig,
    dataClient: Pick<ExchangeDataClient, 'listMarkets'>
  ) {
    super();
    this.config = config;
    this.dataClient = dataClient;
  }

  /**
   * Resolve market metadata for a symbol, reloading once on a miss
   */
  async lookup(symbol: string): Promise<MarketInfo> {
    const cached = this.peek(symbol);
    if (cached) {
      return cached;
    }

    logger.debug('Market metadata miss, reloading', {
      symbol,
      coin: this.toCoin(symbol),
    });

    try {
      await this.reload();
    } catch (error) {
      throw new MarketNotFoundError(symbol, error);
    }

    const reloaded = this.peek(symbol);
    if (!reloaded) {
      throw new MarketNotFoundError(symbol);
    }
    return reloaded;
  }

  /**
   * Probe the current snapshot without reloading
   */
  peek(symbol: string): MarketInfo | undefined {
    return this.snapshot.get(this.toCoin(symbol));
  }

  /**
   * Replace the cache with a fresh market listing.
   * Concurrent callers share the same in-flight fetch.
   */
  reload(): Promise<number> {
    if (!this.inflightReload) {
      this.inflightReload = this.fetchAndPublish().finally(() => {
        this.inflightReload = null;
      });
    }
    return this.inflightReload;
  }

  /**
   * "ETHUSDT" -> "ETH"
   */
  toCoin(symbol: string): string {
    const { quoteSuffix } = this.config;
    if (symbol.length > quoteSuffix.length && symbol.endsWith(quoteSuffix)) {
      return symbol.slice(0, symbol.length - quoteSuffix.length);
    }
    return symbol;
  }

  /**
   * "ETH" -> "ETHUSDT"
   */
  toSymbol(coin: string): string {
    return `${coin}${this.config.quoteSuffix}`;
  }

  markets(): MarketInfo[] {
    return [...this.snapshot.values()];
  }

  get size(): number {
    return this.snapshot.size;
  }

  /** Epoch ms of the last successful reload, null before the first one */
  get lastReloadedAt(): number | null {
    return this.reloadedAt;
  }

  private async fetchAndPublish(): Promise<number> {
    try {
      const markets = await this.dataClient.listMarkets();
      const next = new Map<string, MarketInfo>();

      for (const market of markets) {
        this.assertValid(market);
        if (next.has(market.coin)) {
          throw new Error(`Duplicate market metadata for ${market.coin}`);
        }
        next.set(market.coin, Object.freeze({ ...market }));
      }

      this.snapshot = next;
      this.reloadedAt = Date.now();

      logger.info('Market metadata loaded', { markets: next.size });
      this.emit('reloaded', next.size);
      return next.size;
    } catch (error) {
      const normalizedError = error instanceof Error ? error : new Error(String(error));
      logger.error('Market metadata reload failed', {
        error: errorMessage(normalizedError),
        cachedMarkets: this.snapshot.size,
      });
      this.emit('reloadFailed', normalizedError);
      throw normalizedError;
    }
  }

  private assertValid(market: MarketInfo): void {
    const decimalsValid =
      Number.isInteger(market.sizeDecimals) &&
      market.sizeDecimals >= 0 &&
      Number.isInteger(market.priceDecimals) &&
      market.priceDecimals >= 0;

    if (!market.coin || !decimalsValid || !Number.isInteger(market.marketIndex)) {
      throw new Error(`Invalid market metadata for ${market.coin || '<unnamed>'}`);
    }
  }
}
