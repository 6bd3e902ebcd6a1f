/**
 * Types for Execution Engine
 */

import type { Position, PositionSide } from '../account/types.js';
import type { MarginMode, OrderIntent } from '../exchange/types.js';

// ===========================================
// Configuration Types
// ===========================================

/**
 * Execution Engine configuration
 */
export interface ExecutionEngineConfig {
  /** Adverse offset for marketable IOC orders (0.01 = 1%) */
  slippage: number;

  /** Lifetime of stop-loss / take-profit orders in days */
  protectiveOrderExpiryDays: number;

  /** Margin mode sent with leverage updates unless overridden per symbol */
  defaultMarginMode: MarginMode;
}

// ===========================================
// Workflow Types
// ===========================================

export type WorkflowAction = 'open' | 'close' | 'stopLoss' | 'takeProfit';

/**
 * Best-effort step that failed without aborting the workflow
 */
export interface WorkflowWarning {
  step: 'cancelStaleOrders' | 'cancelRemainingOrders' | 'recordPosition';
  symbol: string;
  message: string;
  timestamp: number;
}

/**
 * Result of a submitted order. The engine never observes fills, so `fill`
 * stays 'unconfirmed' until reconciled against a fresh account query.
 */
export interface OrderOutcome {
  clientOrderIndex: number;
  symbol: string;
  status: 'submitted';
  fill: 'unconfirmed';
  submissionHandle: string;
  submittedAt: number;
}

export interface WorkflowResult {
  action: WorkflowAction;
  /** Side of the position the order opens, closes or protects */
  side: PositionSide;
  outcome: OrderOutcome;
  intent: OrderIntent;

  /** Order size after truncation to the market's size increment */
  quantity: number;

  /**
   * Amount held on `side` right before submission. Unset for protective
   * orders and when the account could not be read.
   */
  positionBefore?: number;

  warnings: WorkflowWarning[];
}

/**
 * Position-level view of a submitted open/close after re-querying the account
 */
export interface Reconciliation {
  symbol: string;
  side: PositionSide;

  /** True once the position moved by the full order size */
  confirmed: boolean;

  /** Position change in the order's direction, zero when it moved the other way */
  filledAmount: number;

  positionBefore: number;
  positionAfter: number;
  position?: Position;
}

// ===========================================
// Event Types
// ===========================================

/**
 * Execution Engine events
 */
export type ExecutionEvents = {
  orderSubmitted: [outcome: OrderOutcome, intent: OrderIntent];
  orderFailed: [symbol: string, error: Error];
  leverageSet: [symbol: string, leverage: number, initialMarginFraction: number];
  warning: [warning: WorkflowWarning];
};
