/**
 * Account Snapshot Types
 */

export type PositionSide = 'long' | 'short';

/**
 * Account balance summary
 */
export interface AccountSnapshot {
  /** Collateral excluding unrealized P&L */
  walletBalance: number;

  availableBalance: number;

  /** Sum of unrealized P&L over all positions */
  unrealizedPnl: number;

  /** Collateral as reported, including unrealized P&L */
  collateral: number;
}

/**
 * Open position, normalized from the account record
 */
export interface Position {
  /** Symbol in COINUSDT convention */
  symbol: string;
  marketIndex: number;
  side: PositionSide;

  /** Absolute position size */
  amount: number;

  entryPrice: number;
  markPrice: number;
  positionValue: number;
  unrealizedPnl: number;
  liquidationPrice: number;

  /** Unset when the exchange reports a non-positive margin fraction */
  leverage?: number;
}

export interface AccountSnapshotReaderConfig {
  accountIndex: number;
}
