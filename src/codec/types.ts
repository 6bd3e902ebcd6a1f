/**
 * Types for the Numeric Codec
 */

export type EncodedField = 'size' | 'price';

export interface NumericCodecConfig {
  /** Decimals used when a symbol has no cached metadata */
  fallbackDecimals: number;

  /** Throw MarketNotFoundError instead of using fallbackDecimals */
  strictPrecision: boolean;
}

export type NumericCodecEvents = {
  fallbackPrecision: [symbol: string, field: EncodedField, decimals: number];
};
