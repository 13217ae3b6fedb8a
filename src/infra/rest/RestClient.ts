import type { z } from 'zod';
import type { CredentialProvider } from '@/application/interfaces/CredentialProvider';
import type { Logger } from '@/application/interfaces/Logger';
import { ApiError, ProtocolError, TokenExpiredError, TransportError, ValidationError } from '@/domain/errors';
import type { OrderRequest } from '@/domain/models/Order';
import type { Token } from '@/domain/models/Token';
import { ALL_MARKET_DATA_ENTRIES, Market, type MarketDataEntry, OrderType, TimeInForce } from '@/domain/types';
import { ErrorBodySchema, formatZodIssues, OrderRequestSchema } from '@/infra/codec/schemas';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { RestPaths } from './paths';
import {
  type InstrumentDetailResponse,
  InstrumentDetailResponseSchema,
  type InstrumentsResponse,
  InstrumentsResponseSchema,
  type MarketDataResponse,
  MarketDataResponseSchema,
  type OrderAckResponse,
  OrderAckResponseSchema,
  type OrderStatusResponse,
  OrderStatusResponseSchema,
  type OrdersResponse,
  OrdersResponseSchema,
  type SegmentsResponse,
  SegmentsResponseSchema,
  type TradesResponse,
  TradesResponseSchema,
} from './schemas';

export interface RestClientOptions {
  /** REST API のベース URL（末尾スラッシュ付き） */
  baseUrl: string;
  credentials: CredentialProvider;
  fetchFn?: typeof fetch;
  logger?: Logger;
}

export interface MarketDataQuery {
  ticker: string;
  entries?: readonly MarketDataEntry[];
  depth?: number;
  market?: Market;
}

export interface TradeHistoryQuery {
  ticker: string;
  /** yyyy-MM-dd */
  startDate: string;
  /** yyyy-MM-dd */
  endDate: string;
  market?: Market;
}

/**
 * インフラ層: REST API クライアント
 *
 * 責務:
 * - すべての要求に X-Auth-Token を付ける
 * - 401 ならトークンを 1 回だけ取得し直して再送し、それでも 401 なら TokenExpiredError
 * - status=ERROR の応答は ApiError、スキーマに合わない応答は ProtocolError
 */
export class RestClient {
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: RestClientOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'RestClient' });
  }

  getSegments(): Promise<SegmentsResponse> {
    return this.request(RestPaths.segments(), SegmentsResponseSchema);
  }

  getAllInstruments(): Promise<InstrumentsResponse> {
    return this.request(RestPaths.instruments(), InstrumentsResponseSchema);
  }

  getDetailedInstruments(): Promise<InstrumentsResponse> {
    return this.request(RestPaths.detailedInstruments(), InstrumentsResponseSchema);
  }

  getInstrumentDetails(ticker: string, market: Market = Market.ROFEX): Promise<InstrumentDetailResponse> {
    return this.request(RestPaths.instrumentDetail(ticker, market), InstrumentDetailResponseSchema);
  }

  getMarketData(query: MarketDataQuery): Promise<MarketDataResponse> {
    const entries = query.entries ?? ALL_MARKET_DATA_ENTRIES;
    return this.request(
      RestPaths.marketData(query.market ?? Market.ROFEX, query.ticker, entries, query.depth ?? 1),
      MarketDataResponseSchema
    );
  }

  getTradeHistory(query: TradeHistoryQuery): Promise<TradesResponse> {
    return this.request(
      RestPaths.trades(query.market ?? Market.ROFEX, query.ticker, query.startDate, query.endDate),
      TradesResponseSchema
    );
  }

  getOrderStatus(clientOrderId: string, proprietary: string): Promise<OrderStatusResponse> {
    return this.request(RestPaths.orderStatus(clientOrderId, proprietary), OrderStatusResponseSchema);
  }

  getAllOrdersByAccount(account: string): Promise<OrdersResponse> {
    return this.request(RestPaths.allOrders(account), OrdersResponseSchema);
  }

  /**
   * 新規注文を送る。
   * @throws {ValidationError} 注文内容が不正な場合（要求は送られない）
   */
  sendOrder(order: OrderRequest): Promise<OrderAckResponse> {
    const parsed = OrderRequestSchema.safeParse(order);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      return Promise.reject(new ValidationError(`invalid order: ${issues.join('; ')}`, issues));
    }
    const valid = parsed.data;

    const params: Record<string, string | number | boolean> = {
      marketId: valid.market,
      symbol: valid.ticker,
      orderQty: valid.size,
      ordType: valid.orderType,
      side: valid.side,
      timeInForce: valid.timeInForce,
      account: valid.account,
      cancelPrevious: valid.cancelPrevious,
    };
    if (valid.orderType === OrderType.LIMIT && valid.price !== undefined) {
      params.price = valid.price;
    }
    if (valid.timeInForce === TimeInForce.GOOD_TILL_DATE && valid.expireDate !== undefined) {
      params.expireDate = valid.expireDate;
    }
    if (valid.iceberg && valid.displayQuantity !== undefined) {
      params.iceberg = true;
      params.displayQty = valid.displayQuantity;
    }

    return this.request(RestPaths.newOrder(params), OrderAckResponseSchema);
  }

  cancelOrder(clientOrderId: string, proprietary: string): Promise<OrderAckResponse> {
    return this.request(RestPaths.cancelOrder(clientOrderId, proprietary), OrderAckResponseSchema);
  }

  private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const token = await this.options.credentials.getToken();
    let response = await this.get(path, token);

    if (response.status === 401) {
      this.logger.warn('Token rejected, refreshing', { path });
      const refreshed = await this.options.credentials.refresh();
      response = await this.get(path, refreshed);
      if (response.status === 401) {
        this.options.credentials.invalidate();
        throw new TokenExpiredError('Authentication Fails.');
      }
    }

    const text = await response.text();
    if (!response.ok) {
      throw new ApiError(`request failed with status ${response.status}: ${path}`, response.status, text);
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ProtocolError(`response is not valid JSON: ${path}`, text, { cause: error });
    }

    const errorBody = ErrorBodySchema.safeParse(body);
    if (errorBody.success) {
      const description = errorBody.data.description ?? errorBody.data.message ?? 'unknown error';
      throw new ApiError(description, response.status, text);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError(
        `unexpected response for ${path}: ${formatZodIssues(parsed.error).join('; ')}`,
        text,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  private async get(path: string, token: Token): Promise<Response> {
    const url = `${this.options.baseUrl}${path}`;
    try {
      return await this.fetchFn(url, { headers: { 'X-Auth-Token': token.value } });
    } catch (error) {
      throw new TransportError(`request failed: ${url}`, { cause: error });
    }
  }
}
