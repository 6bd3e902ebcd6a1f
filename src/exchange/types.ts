/**
 * Exchange collaborator contracts
 *
 * The engine never signs or serialises transactions itself. It hands fully
 * encoded requests to an OrderSigner and reads market/account state through
 * an ExchangeDataClient.
 */

import type { MarketInfo } from '../market/types.js';

// ===========================================
// Order Types
// ===========================================

export type MarginMode = 'cross' | 'isolated';

export type OrderType = 'limit' | 'stopLoss' | 'takeProfit';

/**
 * Time in force: immediate-or-cancel, or good-till-time (needs expiry)
 */
export type TimeInForce = 'ioc' | 'gtt';

/**
 * Fully encoded order handed to the signer. Prices and sizes are raw
 * exchange integers.
 */
export interface OrderIntent {
  symbol: string;
  marketIndex: number;
  clientOrderIndex: number;
  rawQuantity: number;
  limitPrice: number;
  isAsk: boolean;
  reduceOnly: boolean;
  orderType: OrderType;
  timeInForce: TimeInForce;
  triggerPrice?: number;
  /** Expiry as epoch milliseconds */
  expiry?: number;
}

/**
 * Transaction signer/submitter. Each call resolves to the submission handle
 * (transaction hash) once the request is accepted for submission, or rejects.
 */
export interface OrderSigner {
  createOrder(intent: OrderIntent): Promise<string>;
  cancelAllOrders(symbol: string, timestamp: number): Promise<string>;
  updateLeverage(
    marketIndex: number,
    initialMarginFraction: number,
    marginMode: MarginMode
  ): Promise<string>;
}

// ===========================================
// Market & Account Data Types
// ===========================================

/**
 * Position as reported in the account record
 */
export interface AccountPositionRecord {
  marketIndex: number;
  coin: string;
  /** Signed quantity: positive long, negative short */
  quantity: number;
  avgEntryPrice: number;
  positionValue: number;
  unrealizedPnl: number;
  liquidationPrice: number;
  /** Initial margin fraction as a percentage, e.g. 10 for 10x */
  initialMarginFraction: number;
  markPrice?: number;
}

export interface AccountRecord {
  index: number;
  availableBalance: number;
  /** Collateral including unrealized P&L */
  collateral: number;
  positions: AccountPositionRecord[];
}

export interface OrderBookDetail {
  markPrice?: number;
  bestAsk?: number;
  bestBid?: number;
}

/**
 * Market/account data client
 */
export interface ExchangeDataClient {
  listMarkets(): Promise<MarketInfo[]>;

  /** Resolves null when the exchange has no such account */
  getAccount(accountIndex: number): Promise<AccountRecord | null>;

  getOrderBookDetail(marketIndex: number): Promise<OrderBookDetail>;
}
