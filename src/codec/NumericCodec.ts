/**
 * Numeric Codec
 *
 * Converts human quantities and prices to the exchange's fixed-point
 * integers (value * 10^decimals, truncated toward zero) and back.
 *
 * Symbols without cached metadata are encoded at `fallbackDecimals`
 * (4 by default) unless `strictPrecision` is set. The fallback can
 * misencode size or price for markets whose real precision differs, so
 * every use is logged at warn level and emitted as `fallbackPrecision`.
 *
 * Workflows that already resolved a `MarketInfo` encode through
 * `encodeSize`/`encodePrice`, so one order is encoded from one snapshot
 * even if the cache reloads in between.
 */

import Decimal from 'decimal.js';
import EventEmitter from 'eventemitter3';
import { logger } from '../logger.js';
import { InvalidRequestError, MarketNotFoundError } from '../execution/errors.js';
import type { MarketInfo } from '../market/types.js';
import type { EncodedField, NumericCodecConfig, NumericCodecEvents } from './types.js';

export interface MarketInfoSource {
  peek(symbol: string): MarketInfo | undefined;
}

export class NumericCodec extends EventEmitter<NumericCodecEvents> {
  private readonly config: NumericCodecConfig;
  private readonly markets: MarketInfoSource;

  constructor(config: NumericCodecConfig, markets: MarketInfoSource) {
    super();
    if (!Number.isInteger(config.fallbackDecimals) || config.fallbackDecimals < 0) {
      throw new Error(`fallbackDecimals must be a non-negative integer, got ${config.fallbackDecimals}`);
    }
    this.config = config;
    this.markets = markets;
  }

  toRawSize(symbol: string, quantity: number): number {
    return this.encode(symbol, quantity, 'size', this.decimalsFor(symbol, 'size'));
  }

  toRawPrice(symbol: string, price: number): number {
    return this.encode(symbol, price, 'price', this.decimalsFor(symbol, 'price'));
  }

  fromRawSize(symbol: string, raw: number): number {
    return this.decode(symbol, raw, 'size', this.decimalsFor(symbol, 'size'));
  }

  fromRawPrice(symbol: string, raw: number): number {
    return this.decode(symbol, raw, 'price', this.decimalsFor(symbol, 'price'));
  }

  /**
   * Encode a size with the decimals of an already resolved market
   */
  encodeSize(market: MarketInfo, quantity: number): number {
    return this.encode(market.coin, quantity, 'size', market.sizeDecimals);
  }

  encodePrice(market: MarketInfo, price: number): number {
    return this.encode(market.coin, price, 'price', market.priceDecimals);
  }

  decodeSize(market: MarketInfo, raw: number): number {
    return this.decode(market.coin, raw, 'size', market.sizeDecimals);
  }

  /**
   * Quantity truncated to the market's size precision, e.g. "0.0120"
   */
  formatQuantity(symbol: string, quantity: number): string {
    this.assertFinite(symbol, quantity, 'size');
    const decimals = this.decimalsFor(symbol, 'size');
    return new Decimal(quantity).toFixed(decimals, Decimal.ROUND_DOWN);
  }

  /**
   * Decimals for a field, applying the fallback policy on a miss
   */
  decimalsFor(symbol: string, field: EncodedField): number {
    const market = this.markets.peek(symbol);
    if (market) {
      return field === 'size' ? market.sizeDecimals : market.priceDecimals;
    }

    if (this.config.strictPrecision) {
      throw new MarketNotFoundError(symbol);
    }

    logger.warn('No market metadata, using fallback precision', {
      symbol,
      field,
      decimals: this.config.fallbackDecimals,
    });
    this.emit('fallbackPrecision', symbol, field, this.config.fallbackDecimals);
    return this.config.fallbackDecimals;
  }

  private encode(symbol: string, value: number, field: EncodedField, decimals: number): number {
    this.assertFinite(symbol, value, field);
    const scale = new Decimal(10).pow(decimals);
    const raw = new Decimal(value).times(scale).trunc().toNumber();

    if (!Number.isSafeInteger(raw)) {
      throw new InvalidRequestError(`Encoded ${field} ${raw} is outside the safe integer range`, symbol);
    }
    // trunc of a small negative leaves -0
    return raw === 0 ? 0 : raw;
  }

  private decode(symbol: string, raw: number, field: EncodedField, decimals: number): number {
    if (!Number.isSafeInteger(raw)) {
      throw new InvalidRequestError(`Raw ${field} must be a safe integer, got ${raw}`, symbol);
    }
    const scale = new Decimal(10).pow(decimals);
    return new Decimal(raw).div(scale).toNumber();
  }

  private assertFinite(symbol: string, value: number, field: EncodedField): void {
    if (!Number.isFinite(value)) {
      throw new InvalidRequestError(`${field} must be a finite number, got ${value}`, symbol);
    }
  }
}
