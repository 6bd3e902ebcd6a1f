/**
 * Account Module
 *
 * Balance and position snapshots read from the exchange.
 */

// Types
export type {
  PositionSide,
  AccountSnapshot,
  Position,
  AccountSnapshotReaderConfig,
} from './types.js';
export type { SymbolNaming } from './AccountSnapshotReader.js';

// Classes
export { AccountSnapshotReader } from './AccountSnapshotReader.js';
