/**
 * Numeric Codec Module
 *
 * Fixed-point encoding of order sizes and prices.
 */

// Types
export type { EncodedField, NumericCodecConfig, NumericCodecEvents } from './types.js';
export type { MarketInfoSource } from './NumericCodec.js';

// Classes
export { NumericCodec } from './NumericCodec.js';
