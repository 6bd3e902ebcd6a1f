/**
 * Execution error taxonomy
 *
 * Every error thrown by a workflow is an ExecutionError subclass carrying a
 * stable code, the symbol it concerns and the underlying transport or
 * signing error as `cause`.
 */

import type { WorkflowWarning } from './types.js';

export type ExecutionErrorCode =
  | 'MARKET_NOT_FOUND'
  | 'PRICE_UNAVAILABLE'
  | 'NO_POSITION_TO_CLOSE'
  | 'LEVERAGE_SET_FAILED'
  | 'ORDER_SUBMISSION_FAILED'
  | 'ACCOUNT_UNAVAILABLE'
  | 'INVALID_REQUEST';

export interface ExecutionErrorOptions {
  symbol?: string;
  cause?: unknown;
}

export class ExecutionError extends Error {
  readonly code: ExecutionErrorCode;
  readonly symbol?: string;

  /** Best-effort steps that failed before the workflow aborted */
  warnings: WorkflowWarning[] = [];

  constructor(
    code: ExecutionErrorCode,
    message: string,
    options: ExecutionErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.symbol = options.symbol;
  }
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return '';
  return `: ${cause instanceof Error ? cause.message : String(cause)}`;
}

export class MarketNotFoundError extends ExecutionError {
  constructor(symbol: string, cause?: unknown) {
    super('MARKET_NOT_FOUND', `Market not found for ${symbol}${describeCause(cause)}`, {
      symbol,
      cause,
    });
  }
}

export class PriceUnavailableError extends ExecutionError {
  constructor(symbol: string, cause?: unknown) {
    super('PRICE_UNAVAILABLE', `No price available for ${symbol}${describeCause(cause)}`, {
      symbol,
      cause,
    });
  }
}

export class NoPositionToCloseError extends ExecutionError {
  constructor(symbol: string, side: string) {
    super('NO_POSITION_TO_CLOSE', `No ${side} position to close on ${symbol}`, {
      symbol,
    });
  }
}

export class LeverageSetFailedError extends ExecutionError {
  constructor(symbol: string, leverage: number, cause?: unknown) {
    super(
      'LEVERAGE_SET_FAILED',
      `Failed to set ${leverage}x leverage on ${symbol}${describeCause(cause)}`,
      { symbol, cause }
    );
  }
}

export class OrderSubmissionFailedError extends ExecutionError {
  constructor(symbol: string, cause?: unknown) {
    super('ORDER_SUBMISSION_FAILED', `Order submission failed on ${symbol}${describeCause(cause)}`, {
      symbol,
      cause,
    });
  }
}

export class AccountUnavailableError extends ExecutionError {
  constructor(accountIndex: number) {
    super('ACCOUNT_UNAVAILABLE', `Account ${accountIndex} not found`);
  }
}

export class InvalidRequestError extends ExecutionError {
  constructor(message: string, symbol?: string) {
    super('INVALID_REQUEST', message, { symbol });
  }
}
