/**
 * Tests for App wiring
 */

import { describe, it, expect } from 'vitest';
import { App } from '../src/app.js';
import { config, type Config } from '../src/config.js';
import { DryRunSigner } from '../src/exchange/DryRunSigner.js';
import { createMockDataClient, createMockSigner } from './helpers/fakes.js';

function settings(enabled: boolean): Config {
  return {
    ...config,
    execution: { ...config.execution, enabled },
  };
}

describe('App', () => {
  it('should use the dry-run signer while execution is disabled', () => {
    const signer = createMockSigner();

    const app = new App({
      signer,
      dataClient: createMockDataClient(),
      settings: settings(false),
    });

    expect(app.signer).toBeInstanceOf(DryRunSigner);
  });

  it('should use the provided signer when execution is enabled', () => {
    const signer = createMockSigner();

    const app = new App({
      signer,
      dataClient: createMockDataClient(),
      settings: settings(true),
    });

    expect(app.signer).toBe(signer);
  });

  it('should refuse to enable execution without a signer', () => {
    expect(
      () => new App({ dataClient: createMockDataClient(), settings: settings(true) })
    ).toThrow('Execution is enabled but no OrderSigner was provided');
  });

  it('should warm the market cache on start', async () => {
    const app = new App({ dataClient: createMockDataClient(), settings: settings(false) });

    await expect(app.start()).resolves.toBe(true);
    expect(app.markets.size).toBe(2);
  });

  it('should keep running when the initial market load fails', async () => {
    const dataClient = createMockDataClient();
    dataClient.listMarkets.mockRejectedValueOnce(new Error('HTTP 503'));
    const app = new App({ dataClient, settings: settings(false) });

    await expect(app.start()).resolves.toBe(false);
    expect(app.markets.size).toBe(0);
  });

  it('should run an open workflow end to end without signing anything', async () => {
    const app = new App({ dataClient: createMockDataClient(), settings: settings(false) });

    const result = await app.engine.openLong('ETHUSDT', 0.01, 10);

    expect(result.outcome.submissionHandle).toBe('dry-run-3');
    const { signer } = app;
    if (!(signer instanceof DryRunSigner)) {
      throw new Error('expected the dry-run signer');
    }
    expect(signer.getRequests().map((request) => request.kind)).toEqual([
      'cancelAllOrders',
      'updateLeverage',
      'createOrder',
    ]);
  });
});
