/**
 * Tests for DryRunSigner
 */

import { describe, it, expect } from 'vitest';
import { DryRunSigner } from '../../src/exchange/DryRunSigner.js';
import type { OrderIntent } from '../../src/exchange/types.js';

describe('DryRunSigner', () => {
  const intent: OrderIntent = {
    symbol: 'ETHUSDT',
    marketIndex: 0,
    clientOrderIndex: 1,
    rawQuantity: 100,
    limitPrice: 303000,
    isAsk: false,
    reduceOnly: false,
    orderType: 'limit',
    timeInForce: 'ioc',
  };

  it('should answer every request with a sequential handle', async () => {
    const signer = new DryRunSigner();

    await expect(signer.cancelAllOrders('ETHUSDT', 1000)).resolves.toBe('dry-run-1');
    await expect(signer.updateLeverage(0, 1000, 'cross')).resolves.toBe('dry-run-2');
    await expect(signer.createOrder(intent)).resolves.toBe('dry-run-3');
  });

  it('should record requests in order', async () => {
    const signer = new DryRunSigner();

    await signer.updateLeverage(0, 500, 'isolated');
    await signer.createOrder(intent);

    expect(signer.getRequests()).toEqual([
      {
        kind: 'updateLeverage',
        handle: 'dry-run-1',
        marketIndex: 0,
        initialMarginFraction: 500,
        marginMode: 'isolated',
      },
      { kind: 'createOrder', handle: 'dry-run-2', intent },
    ]);
  });
});
