/**
 * Exchange Module
 *
 * Collaborator contracts plus the Lighter REST reader and dry-run signer.
 */

// Types
export type {
  MarginMode,
  OrderType,
  TimeInForce,
  OrderIntent,
  OrderSigner,
  AccountPositionRecord,
  AccountRecord,
  OrderBookDetail,
  ExchangeDataClient,
} from './types.js';
export type { LighterDataClientConfig } from './LighterDataClient.js';
export type { DryRunRequest } from './DryRunSigner.js';

// Classes
export { LighterDataClient } from './LighterDataClient.js';
export { DryRunSigner } from './DryRunSigner.js';
export { ExchangeRequestError } from './errors.js';
