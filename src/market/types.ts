/**
 * Types for the Market Metadata Cache
 */

/**
 * Per-market exchange metadata used to encode orders
 */
export interface MarketInfo {
  /** Exchange coin identifier, e.g. "ETH" */
  coin: string;

  marketIndex: number;

  /** Decimal places of the raw size unit */
  sizeDecimals: number;

  /** Decimal places of the raw price unit */
  priceDecimals: number;

  /** Listing status as reported by the exchange, e.g. "active" */
  status?: string;

  minBaseAmount?: number;
  minQuoteAmount?: number;
}

/**
 * Market Metadata Cache configuration
 */
export interface MarketMetadataCacheConfig {
  /** Quote suffix stripped from symbols, e.g. "USDT" */
  quoteSuffix: string;
}

/**
 * Market Metadata Cache events
 */
export type MarketMetadataEvents = {
  reloaded: [count: number];
  reloadFailed: [error: Error];
};
