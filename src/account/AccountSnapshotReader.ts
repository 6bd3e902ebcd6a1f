/**
 * Account Snapshot Reader
 *
 * Fetches the account record and projects balances or open positions.
 * Nothing is cached: every call is a fresh fetch, and getBalance() and
 * getPositions() may observe different account states.
 */

import { logger } from '../logger.js';
import { AccountUnavailableError } from '../execution/errors.js';
import type { AccountPositionRecord, ExchangeDataClient } from '../exchange/types.js';
import type {
  AccountSnapshot,
  AccountSnapshotReaderConfig,
  Position,
  PositionSide,
} from './types.js';

export interface SymbolNaming {
  toSymbol(coin: string): string;
  toCoin(symbol: string): string;
}

export class AccountSnapshotReader {
  private readonly config: AccountSnapshotReaderConfig;
  private readonly dataClient: Pick<ExchangeDataClient, 'getAccount'>;
  private readonly naming: SymbolNaming;

  constructor(
    config: AccountSnapshotReaderConfig,
    dataClient: Pick<ExchangeDataClient, 'getAccount'>,
    naming: SymbolNaming
  ) {
    this.config = config;
    this.dataClient = dataClient;
    this.naming = naming;
  }

  /**
   * Get account balances
   *
   * Exchange collateral already includes unrealized P&L, so the wallet
   * balance is collateral minus the summed unrealized P&L.
   */
  async getBalance(): Promise<AccountSnapshot> {
    const account = await this.dataClient.getAccount(this.config.accountIndex);
    if (!account) {
      throw new AccountUnavailableError(this.config.accountIndex);
    }

    const unrealizedPnl = account.positions.reduce(
      (total, position) => total + position.unrealizedPnl,
      0
    );

    const snapshot: AccountSnapshot = {
      walletBalance: account.collateral - unrealizedPnl,
      availableBalance: account.availableBalance,
      unrealizedPnl,
      collateral: account.collateral,
    };

    logger.debug('Account balance fetched', {
      accountIndex: this.config.accountIndex,
      ...snapshot,
    });

    return snapshot;
  }

  /**
   * Get open positions (zero-quantity entries excluded)
   */
  async getPositions(): Promise<Position[]> {
    const account = await this.dataClient.getAccount(this.config.accountIndex);
    if (!account) {
      return [];
    }

    // Filter first: toPosition divides by the absolute quantity
    return account.positions
      .filter((record) => record.quantity !== 0)
      .map((record) => this.toPosition(record));
  }

  /**
   * Find the open position for a symbol ("ETHUSDT" or "ETH") and side
   */
  async findPosition(symbol: string, side: PositionSide): Promise<Position | undefined> {
    const coin = this.naming.toCoin(symbol);
    const positions = await this.getPositions();
    return positions.find((p) => this.naming.toCoin(p.symbol) === coin && p.side === side);
  }

  private toPosition(record: AccountPositionRecord): Position {
    const side: PositionSide = record.quantity > 0 ? 'long' : 'short';
    const amount = Math.abs(record.quantity);

    // IMF is a percentage: 10 -> 10x
    const leverage =
      record.initialMarginFraction > 0 ? 100 / record.initialMarginFraction : undefined;

    return {
      symbol: this.naming.toSymbol(record.coin),
      marketIndex: record.marketIndex,
      side,
      amount,
      entryPrice: record.avgEntryPrice,
      markPrice: record.markPrice ?? record.positionValue / amount,
      positionValue: record.positionValue,
      unrealizedPnl: record.unrealizedPnl,
      liquidationPrice: record.liquidationPrice,
      leverage,
    };
  }
}
