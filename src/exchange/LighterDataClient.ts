/**
 * Lighter Data Client
 *
 * REST reader for Lighter market listings, account records and order book
 * details. Responses are validated with zod and normalised to engine types.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../logger.js';
import type { MarketInfo } from '../market/types.js';
import { ExchangeRequestError } from './errors.js';
import type {
  AccountPositionRecord,
  AccountRecord,
  ExchangeDataClient,
  OrderBookDetail,
} from './types.js';

export interface LighterDataClientConfig {
  endpoint: string;
  requestTimeoutMs: number;
}

// Lighter encodes most decimals as strings
const decimal = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const responseCode = z.number().int().optional();

const orderBooksSchema = z.object({
  code: responseCode,
  message: z.string().optional(),
  order_books: z.array(
    z.object({
      symbol: z.string().min(1),
      market_id: z.number().int().nonnegative(),
      status: z.string().optional(),
      min_base_amount: decimal.optional(),
      min_quote_amount: decimal.optional(),
      supported_size_decimals: z.number().int().nonnegative(),
      supported_price_decimals: z.number().int().nonnegative(),
    })
  ),
});

const accountPositionSchema = z.object({
  market_id: z.number().int().nonnegative(),
  symbol: z.string(),
  initial_margin_fraction: decimal,
  sign: z.number().int(),
  position: decimal,
  avg_entry_price: decimal,
  position_value: decimal,
  unrealized_pnl: decimal,
  liquidation_price: decimal,
  mark_price: decimal.optional(),
});

const accountSchema = z.object({
  code: responseCode,
  message: z.string().optional(),
  accounts: z.array(
    z.object({
      index: z.number().int(),
      available_balance: decimal,
      collateral: decimal,
      positions: z.array(accountPositionSchema).default([]),
    })
  ),
});

const priceLevelSchema = z.object({ price: decimal });

const orderBookDetailSchema = z.object({
  code: responseCode,
  message: z.string().optional(),
  mark_price: decimal.optional().catch(undefined),
  asks: z.array(priceLevelSchema).optional().catch(undefined),
  bids: z.array(priceLevelSchema).optional().catch(undefined),
});

export class LighterDataClient implements ExchangeDataClient {
  private readonly http: AxiosInstance;

  constructor(config: LighterDataClientConfig, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: config.endpoint,
        timeout: config.requestTimeoutMs,
      });

    logger.info('Lighter Data Client initialized', {
      endpoint: config.endpoint,
      requestTimeoutMs: config.requestTimeoutMs,
    });
  }

  /**
   * Fetch the full market listing
   */
  async listMarkets(): Promise<MarketInfo[]> {
    const body = await this.request('listMarkets', '/api/v1/orderBooks', {}, orderBooksSchema);

    return body.order_books.map((book) => ({
      coin: book.symbol,
      marketIndex: book.market_id,
      sizeDecimals: book.supported_size_decimals,
      priceDecimals: book.supported_price_decimals,
      status: book.status,
      minBaseAmount: book.min_base_amount,
      minQuoteAmount: book.min_quote_amount,
    }));
  }

  /**
   * Fetch an account record by index
   */
  async getAccount(accountIndex: number): Promise<AccountRecord | null> {
    const body = await this.request(
      'getAccount',
      '/api/v1/account',
      { by: 'index', value: accountIndex },
      accountSchema
    );

    const account = body.accounts[0];
    if (!account) {
      return null;
    }

    return {
      index: account.index,
      availableBalance: account.available_balance,
      collateral: account.collateral,
      positions: account.positions.map((position): AccountPositionRecord => {
        // position is unsigned; sign carries the direction
        const size = Math.abs(position.position);
        return {
          marketIndex: position.market_id,
          coin: position.symbol,
          quantity: position.sign > 0 ? size : -size,
          avgEntryPrice: position.avg_entry_price,
          positionValue: position.position_value,
          unrealizedPnl: position.unrealized_pnl,
          liquidationPrice: position.liquidation_price,
          initialMarginFraction: position.initial_margin_fraction,
          markPrice: position.mark_price,
        };
      }),
    };
  }

  /**
   * Fetch mark price and top of book for a market
   */
  async getOrderBookDetail(marketIndex: number): Promise<OrderBookDetail> {
    const body = await this.request(
      'getOrderBookDetail',
      '/api/v1/orderBookDetails',
      { market_id: marketIndex },
      orderBookDetailSchema
    );

    return {
      markPrice: body.mark_price,
      bestAsk: body.asks?.[0]?.price,
      bestBid: body.bids?.[0]?.price,
    };
  }

  private async request<T extends { code?: number; message?: string }>(
    operation: string,
    path: string,
    params: Record<string, string | number>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(path, { params });
      data = response.data;
    } catch (error) {
      const requestError = this.normalizeError(operation, error);
      logger.error('Lighter request failed', {
        operation,
        path,
        error: requestError.message,
      });
      throw requestError;
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ExchangeRequestError(operation, `unexpected response shape (${parsed.error.message})`, {
        cause: parsed.error,
      });
    }

    const { code, message } = parsed.data;
    if (code !== undefined && code !== 200) {
      throw new ExchangeRequestError(operation, `API error ${code}: ${message ?? 'unknown'}`);
    }

    return parsed.data;
  }

  /**
   * Normalize transport errors to ExchangeRequestError
   */
  private normalizeError(operation: string, error: unknown): ExchangeRequestError {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        return new ExchangeRequestError(
          operation,
          `HTTP ${error.response.status}: ${JSON.stringify(error.response.data)}`,
          { status: error.response.status, cause: error }
        );
      }
      return new ExchangeRequestError(operation, error.message, { cause: error });
    }
    return new ExchangeRequestError(
      operation,
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }
}
