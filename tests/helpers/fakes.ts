/**
 * Shared test doubles for the exchange collaborators
 */

import { vi } from 'vitest';
import type {
  AccountPositionRecord,
  AccountRecord,
  MarginMode,
  OrderBookDetail,
  OrderIntent,
} from '../../src/exchange/types.js';
import type { MarketInfo } from '../../src/market/types.js';

export const ETH_MARKET: MarketInfo = {
  coin: 'ETH',
  marketIndex: 0,
  sizeDecimals: 4,
  priceDecimals: 2,
};

export const BTC_MARKET: MarketInfo = {
  coin: 'BTC',
  marketIndex: 1,
  sizeDecimals: 5,
  priceDecimals: 1,
};

export function createMockSigner(calls: string[] = []) {
  return {
    createOrder: vi.fn(async (intent: OrderIntent) => {
      calls.push(`createOrder:${intent.symbol}`);
      return '0xorder';
    }),
    cancelAllOrders: vi.fn(async (symbol: string, _timestamp: number) => {
      calls.push(`cancelAllOrders:${symbol}`);
      return '0xcancel';
    }),
    updateLeverage: vi.fn(
      async (marketIndex: number, _imf: number, _marginMode: MarginMode) => {
        calls.push(`updateLeverage:${marketIndex}`);
        return '0xleverage';
      }
    ),
  };
}

export function createMockDataClient(
  options: {
    markets?: MarketInfo[];
    orderBook?: OrderBookDetail;
    account?: AccountRecord | null;
    calls?: string[];
  } = {}
) {
  const calls = options.calls ?? [];
  return {
    listMarkets: vi.fn(async (): Promise<MarketInfo[]> => {
      calls.push('listMarkets');
      return options.markets ?? [ETH_MARKET, BTC_MARKET];
    }),
    getAccount: vi.fn(async (_accountIndex: number): Promise<AccountRecord | null> => {
      calls.push('getAccount');
      return options.account === undefined ? null : options.account;
    }),
    getOrderBookDetail: vi.fn(async (marketIndex: number): Promise<OrderBookDetail> => {
      calls.push(`getOrderBookDetail:${marketIndex}`);
      return options.orderBook ?? { markPrice: 3000 };
    }),
  };
}

export function positionRecord(
  overrides: Partial<AccountPositionRecord> = {}
): AccountPositionRecord {
  return {
    marketIndex: 0,
    coin: 'ETH',
    quantity: 1,
    avgEntryPrice: 2900,
    positionValue: 3000,
    unrealizedPnl: 100,
    liquidationPrice: 2500,
    initialMarginFraction: 10,
    ...overrides,
  };
}

export function accountRecord(positions: AccountPositionRecord[] = []): AccountRecord {
  return {
    index: 7,
    availableBalance: 800,
    collateral: 1000,
    positions,
  };
}

/**
 * Promise that resolves when the test says so
 */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
