/**
 * Tests for MarketMetadataCache
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MarketMetadataCache } from '../../src/market/MarketMetadataCache.js';
import { MarketNotFoundError } from '../../src/execution/errors.js';
import type { MarketInfo } from '../../src/market/types.js';
import { BTC_MARKET, ETH_MARKET, createMockDataClient, deferred } from '../helpers/fakes.js';

describe('MarketMetadataCache', () => {
  let dataClient: ReturnType<typeof createMockDataClient>;
  let cache: MarketMetadataCache;

  beforeEach(() => {
    dataClient = createMockDataClient();
    cache = new MarketMetadataCache({ quoteSuffix: 'USDT' }, dataClient);
  });

  describe('symbol naming', () => {
    it('should strip the quote suffix', () => {
      expect(cache.toCoin('ETHUSDT')).toBe('ETH');
      expect(cache.toCoin('ETH')).toBe('ETH');
      expect(cache.toCoin('USDT')).toBe('USDT');
    });

    it('should append the quote suffix', () => {
      expect(cache.toSymbol('BTC')).toBe('BTCUSDT');
    });
  });

  describe('lookup', () => {
    it('should reload on the first miss and serve later lookups from cache', async () => {
      const first = await cache.lookup('ETHUSDT');
      const second = await cache.lookup('ETHUSDT');
      const btc = await cache.lookup('BTCUSDT');

      expect(first).toEqual(ETH_MARKET);
      expect(second).toBe(first);
      expect(btc.marketIndex).toBe(1);
      expect(dataClient.listMarkets).toHaveBeenCalledTimes(1);
    });

    it('should accept a bare coin', async () => {
      const market = await cache.lookup('BTC');

      expect(market).toEqual(BTC_MARKET);
    });

    it('should reload exactly once and report MarketNotFound on a second miss', async () => {
      await expect(cache.lookup('DOGEUSDT')).rejects.toBeInstanceOf(MarketNotFoundError);
      expect(dataClient.listMarkets).toHaveBeenCalledTimes(1);
    });

    it('should wrap a failed reload in MarketNotFound', async () => {
      const failure = new Error('connection reset');
      dataClient.listMarkets.mockRejectedValueOnce(failure);

      const error = await cache.lookup('ETHUSDT').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MarketNotFoundError);
      expect(error).toMatchObject({ code: 'MARKET_NOT_FOUND', symbol: 'ETHUSDT', cause: failure });
    });
  });

  describe('reload', () => {
    it('should replace the whole map', async () => {
      await cache.reload();
      expect(cache.size).toBe(2);

      dataClient.listMarkets.mockResolvedValueOnce([{ ...ETH_MARKET, sizeDecimals: 3 }]);
      const count = await cache.reload();

      expect(count).toBe(1);
      expect(cache.peek('BTCUSDT')).toBeUndefined();
      expect(cache.peek('ETHUSDT')?.sizeDecimals).toBe(3);
    });

    it('should keep the previous snapshot when a reload fails', async () => {
      await cache.reload();
      const failedHandler = vi.fn();
      cache.on('reloadFailed', failedHandler);
      dataClient.listMarkets.mockRejectedValueOnce(new Error('503'));

      await expect(cache.reload()).rejects.toThrow('503');

      expect(cache.peek('ETHUSDT')).toEqual(ETH_MARKET);
      expect(cache.size).toBe(2);
      expect(failedHandler).toHaveBeenCalledWith(expect.objectContaining({ message: '503' }));
    });

    it('should reject the whole listing when one entry is invalid', async () => {
      dataClient.listMarkets.mockResolvedValueOnce([
        ETH_MARKET,
        { ...BTC_MARKET, priceDecimals: -1 },
      ]);

      await expect(cache.reload()).rejects.toThrow('Invalid market metadata for BTC');
      expect(cache.size).toBe(0);
    });

    it('should reject duplicate coins', async () => {
      dataClient.listMarkets.mockResolvedValueOnce([ETH_MARKET, { ...ETH_MARKET, marketIndex: 9 }]);

      await expect(cache.reload()).rejects.toThrow('Duplicate market metadata for ETH');
    });

    it('should share one fetch between concurrent reloads', async () => {
      const [a, b] = await Promise.all([cache.reload(), cache.reload()]);

      expect(a).toBe(2);
      expect(b).toBe(2);
      expect(dataClient.listMarkets).toHaveBeenCalledTimes(1);
    });

    it('should serve the old snapshot while a reload is in flight', async () => {
      await cache.reload();
      const pending = deferred<MarketInfo[]>();
      dataClient.listMarkets.mockImplementationOnce(() => pending.promise);

      const reloading = cache.reload();
      expect(cache.peek('ETHUSDT')?.sizeDecimals).toBe(4);

      pending.resolve([{ ...ETH_MARKET, sizeDecimals: 6 }]);
      await reloading;

      expect(cache.peek('ETHUSDT')?.sizeDecimals).toBe(6);
    });

    it('should record the reload time and emit reloaded', async () => {
      const handler = vi.fn();
      cache.on('reloaded', handler);
      expect(cache.lastReloadedAt).toBeNull();

      await cache.reload();

      expect(cache.lastReloadedAt).toEqual(expect.any(Number));
      expect(handler).toHaveBeenCalledWith(2);
      expect(cache.markets().map((m) => m.coin)).toEqual(['ETH', 'BTC']);
    });
  });
});
