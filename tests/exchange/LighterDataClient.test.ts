/**
 * Tests for LighterDataClient
 *
 * HTTP is served in-process by a custom axios adapter.
 */

import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { LighterDataClient } from '../../src/exchange/LighterDataClient.js';
import { ExchangeRequestError } from '../../src/exchange/errors.js';

type Route = { status: number; data: unknown };

function createClient(routes: Record<string, Route>) {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const route = routes[config.url ?? ''] ?? { status: 404, data: { message: 'not found' } };
    const response = {
      data: route.data,
      status: route.status,
      statusText: String(route.status),
      headers: {},
      config,
    };
    if (route.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${route.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response
      );
    }
    return response;
  };

  const http = axios.create({ baseURL: 'https://lighter.test', adapter });
  const client = new LighterDataClient(
    { endpoint: 'https://lighter.test', requestTimeoutMs: 1000 },
    http
  );
  return { client, requests };
}

describe('LighterDataClient', () => {
  describe('listMarkets', () => {
    it('should map order books to market metadata', async () => {
      const { client } = createClient({
        '/api/v1/orderBooks': {
          status: 200,
          data: {
            code: 200,
            order_books: [
              {
                symbol: 'ETH',
                market_id: 0,
                status: 'active',
                taker_fee: '0.0000',
                min_base_amount: '0.0050',
                min_quote_amount: '10.000000',
                supported_size_decimals: 4,
                supported_price_decimals: 2,
                supported_quote_decimals: 6,
              },
            ],
          },
        },
      });

      const markets = await client.listMarkets();

      expect(markets).toEqual([
        {
          coin: 'ETH',
          marketIndex: 0,
          sizeDecimals: 4,
          priceDecimals: 2,
          status: 'active',
          minBaseAmount: 0.005,
          minQuoteAmount: 10,
        },
      ]);
    });

    it('should reject a non-200 body code', async () => {
      const { client } = createClient({
        '/api/v1/orderBooks': {
          status: 200,
          data: { code: 29500, message: 'internal error', order_books: [] },
        },
      });

      await expect(client.listMarkets()).rejects.toThrow(
        'listMarkets failed: API error 29500: internal error'
      );
    });

    it('should reject an unexpected response shape', async () => {
      const { client } = createClient({
        '/api/v1/orderBooks': { status: 200, data: { code: 200, order_books: 'nope' } },
      });

      await expect(client.listMarkets()).rejects.toBeInstanceOf(ExchangeRequestError);
    });
  });

  describe('getAccount', () => {
    const accountBody = {
      code: 200,
      total: 1,
      accounts: [
        {
          index: 7,
          available_balance: '812.50',
          collateral: '1020.00',
          positions: [
            {
              market_id: 1,
              symbol: 'BTC',
              initial_margin_fraction: '20.00',
              sign: -1,
              position: '0.15000',
              avg_entry_price: '61000.0',
              position_value: '9000.00',
              unrealized_pnl: '150.00',
              liquidation_price: '70000.0',
              margin_mode: 0,
            },
          ],
        },
      ],
    };

    it('should query by index and sign positions', async () => {
      const { client, requests } = createClient({
        '/api/v1/account': { status: 200, data: accountBody },
      });

      const account = await client.getAccount(7);

      expect(requests[0]?.params).toEqual({ by: 'index', value: 7 });
      expect(account).toEqual({
        index: 7,
        availableBalance: 812.5,
        collateral: 1020,
        positions: [
          {
            marketIndex: 1,
            coin: 'BTC',
            quantity: -0.15,
            avgEntryPrice: 61000,
            positionValue: 9000,
            unrealizedPnl: 150,
            liquidationPrice: 70000,
            initialMarginFraction: 20,
            markPrice: undefined,
          },
        ],
      });
    });

    it('should return null when no account matches', async () => {
      const { client } = createClient({
        '/api/v1/account': { status: 200, data: { code: 200, total: 0, accounts: [] } },
      });

      await expect(client.getAccount(99)).resolves.toBeNull();
    });

    it('should carry the HTTP status on transport errors', async () => {
      const { client } = createClient({
        '/api/v1/account': { status: 503, data: { message: 'maintenance' } },
      });

      const error = await client.getAccount(7).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExchangeRequestError);
      expect(error).toMatchObject({
        operation: 'getAccount',
        status: 503,
        message: 'getAccount failed: HTTP 503: {"message":"maintenance"}',
      });
    });
  });

  describe('getOrderBookDetail', () => {
    it('should read the mark price', async () => {
      const { client, requests } = createClient({
        '/api/v1/orderBookDetails': { status: 200, data: { code: 200, mark_price: '3000.5' } },
      });

      const detail = await client.getOrderBookDetail(0);

      expect(requests[0]?.params).toEqual({ market_id: 0 });
      expect(detail).toEqual({ markPrice: 3000.5, bestAsk: undefined, bestBid: undefined });
    });

    it('should read the top of book', async () => {
      const { client } = createClient({
        '/api/v1/orderBookDetails': {
          status: 200,
          data: {
            asks: [{ price: '3001.00' }, { price: '3002.00' }],
            bids: [{ price: '2999.00' }],
          },
        },
      });

      const detail = await client.getOrderBookDetail(0);

      expect(detail).toEqual({ markPrice: undefined, bestAsk: 3001, bestBid: 2999 });
    });
  });
});
