/**
 * Market Metadata Module
 *
 * Per-symbol exchange metadata keyed by coin.
 */

// Types
export type {
  MarketInfo,
  MarketMetadataCacheConfig,
  MarketMetadataEvents,
} from './types.js';

// Classes
export { MarketMetadataCache } from './MarketMetadataCache.js';
