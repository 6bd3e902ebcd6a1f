/**
 * Execution Engine Module
 *
 * Order workflows for opening, closing and protecting positions.
 */

// Types
export type {
  ExecutionEngineConfig,
  WorkflowAction,
  WorkflowWarning,
  OrderOutcome,
  WorkflowResult,
  Reconciliation,
  ExecutionEvents,
} from './types.js';
export type { ExecutionEngineDeps } from './ExecutionEngine.js';
export type { ExecutionErrorCode, ExecutionErrorOptions } from './errors.js';

// Classes
export { ExecutionEngine } from './ExecutionEngine.js';
export { SymbolLock } from './SymbolLock.js';
export {
  ExecutionError,
  MarketNotFoundError,
  PriceUnavailableError,
  NoPositionToCloseError,
  LeverageSetFailedError,
  OrderSubmissionFailedError,
  AccountUnavailableError,
  InvalidRequestError,
} from './errors.js';
