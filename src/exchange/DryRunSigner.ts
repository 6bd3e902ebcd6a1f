/**
 * Dry-Run Signer
 *
 * Stand-in submitter used while execution is disabled. Every request is
 * logged and recorded, and answered with a synthetic handle; nothing is
 * signed or sent.
 */

import { logger } from '../logger.js';
import type { MarginMode, OrderIntent, OrderSigner } from './types.js';

export type DryRunRequest =
  | { kind: 'createOrder'; handle: string; intent: OrderIntent }
  | { kind: 'cancelAllOrders'; handle: string; symbol: string; timestamp: number }
  | {
      kind: 'updateLeverage';
      handle: string;
      marketIndex: number;
      initialMarginFraction: number;
      marginMode: MarginMode;
    };

export class DryRunSigner implements OrderSigner {
  private readonly requests: DryRunRequest[] = [];
  private sequence = 0;

  async createOrder(intent: OrderIntent): Promise<string> {
    const handle = this.nextHandle();
    this.requests.push({ kind: 'createOrder', handle, intent });
    logger.info('[dry-run] Order not sent', { handle, ...intent });
    return handle;
  }

  async cancelAllOrders(symbol: string, timestamp: number): Promise<string> {
    const handle = this.nextHandle();
    this.requests.push({ kind: 'cancelAllOrders', handle, symbol, timestamp });
    logger.info('[dry-run] Cancel-all not sent', { handle, symbol });
    return handle;
  }

  async updateLeverage(
    marketIndex: number,
    initialMarginFraction: number,
    marginMode: MarginMode
  ): Promise<string> {
    const handle = this.nextHandle();
    this.requests.push({
      kind: 'updateLeverage',
      handle,
      marketIndex,
      initialMarginFraction,
      marginMode,
    });
    logger.info('[dry-run] Leverage update not sent', {
      handle,
      marketIndex,
      initialMarginFraction,
      marginMode,
    });
    return handle;
  }

  /**
   * Requests seen so far, oldest first
   */
  getRequests(): readonly DryRunRequest[] {
    return this.requests;
  }

  private nextHandle(): string {
    this.sequence += 1;
    return `dry-run-${this.sequence}`;
  }
}
