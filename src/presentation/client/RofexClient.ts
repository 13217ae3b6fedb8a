import { z } from 'zod';
import type { Logger } from '@/application/interfaces/Logger';
import type { ExceptionHandler, MessageHandler } from '@/application/interfaces/MessageHandler';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { ValidationError } from '@/domain/errors';
import type { ErrorMessage, MarketDataMessage, OrderReportMessage } from '@/domain/models/InboundMessage';
import type { OrderRequest } from '@/domain/models/Order';
import type {
  MarketDataSubscription,
  MarketDataSubscriptionSpec,
  OrderReportSubscription,
} from '@/domain/models/Subscription';
import { type Environment, Market, type MarketDataEntry, OrderType, TimeInForce } from '@/domain/types';
import { RestCredentialProvider } from '@/infra/auth/RestCredentialProvider';
import { formatZodIssues } from '@/infra/codec/schemas';
import { type EnvironmentConfig, EnvironmentSchema, resolveEnvironmentConfig } from '@/infra/config/environments';
import { DEFAULT_STREAMING_SETTINGS, type StreamingSettings } from '@/infra/config/streaming';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type MarketDataQuery, RestClient, type TradeHistoryQuery } from '@/infra/rest/RestClient';
import type {
  InstrumentDetailResponse,
  InstrumentsResponse,
  MarketDataResponse,
  OrderAckResponse,
  OrderStatusResponse,
  OrdersResponse,
  SegmentsResponse,
  TradesResponse,
} from '@/infra/rest/schemas';
import type { WebSocketConnector } from '@/infra/websocket/interfaces/WebSocketConnection';
import { type HandshakeMode, StreamingSession } from '@/presentation/websocket/StreamingSession';

export interface InitializeParams {
  user: string;
  password: string;
  account: string;
  environment: Environment;
  overrides?: Partial<EnvironmentConfig>;
}

export interface RofexClientOptions {
  logger?: Logger;
  metricsCollector?: MetricsCollector;
  fetchFn?: typeof fetch;
  connector?: WebSocketConnector;
  handshakeMode?: HandshakeMode;
  streaming?: Partial<StreamingSettings>;
  tokenTtlMs?: number;
}

export interface WebsocketHandlers {
  marketData?: MessageHandler<MarketDataMessage>;
  orderReport?: MessageHandler<OrderReportMessage>;
  error?: MessageHandler<ErrorMessage>;
  exception?: ExceptionHandler;
}

/** 口座・市場などを省略できる注文（省略時は環境の既定値） */
export type ClientOrderRequest = Omit<
  OrderRequest,
  'account' | 'market' | 'orderType' | 'timeInForce' | 'cancelPrevious' | 'iceberg'
> &
  Partial<Pick<OrderRequest, 'account' | 'market' | 'orderType' | 'timeInForce' | 'cancelPrevious' | 'iceberg'>>;

interface EnvironmentContext {
  config: EnvironmentConfig;
  account: string;
  rest: RestClient;
  session: StreamingSession;
}

const InitializeParamsSchema = z.object({
  user: z.string().min(1, 'user is required'),
  password: z.string().min(1, 'password is required'),
  account: z.string().min(1, 'account is required'),
  environment: EnvironmentSchema,
});

/**
 * プレゼンテーション層: 取引所クライアント
 *
 * 責務:
 * - 初期化済み環境ごとのコンテキスト（資格情報・REST・ストリーミングセッション）を保持する
 * - 既定の環境を管理し、environment を省略した呼び出しを既定の環境へ振り分ける
 * - REST とストリーミングの操作を口座・proprietary の既定値付きで公開する
 */
export class RofexClient {
  private readonly contexts = new Map<Environment, EnvironmentContext>();
  private defaultEnvironment: Environment | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: RofexClientOptions = {}) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'RofexClient' });
  }

  /**
   * 認証して環境を登録し、既定の環境にする。同じ環境を再初期化すると既存のセッションは閉じられる。
   * @throws {ValidationError} 引数が不正な場合
   * @throws {AuthenticationError} 資格情報が拒否された場合
   */
  async initialize(params: InitializeParams): Promise<void> {
    const parsed = InitializeParamsSchema.safeParse(params);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error);
      throw new ValidationError(`invalid initialize parameters: ${issues.join('; ')}`, issues);
    }
    const { user, password, account, environment } = parsed.data;
    const config = resolveEnvironmentConfig(environment, params.overrides);
    const logger = this.logger.child({ environment });

    const credentials = new RestCredentialProvider({
      baseUrl: config.restUrl,
      user,
      password,
      tokenTtlMs: this.options.tokenTtlMs,
      fetchFn: this.options.fetchFn,
      logger,
    });
    await credentials.getToken();

    const streaming = { ...DEFAULT_STREAMING_SETTINGS, ...this.options.streaming };
    const session = new StreamingSession({
      url: config.wsUrl,
      credentials,
      connector: this.options.connector,
      handshakeMode: this.options.handshakeMode,
      authTimeoutMs: streaming.authTimeoutMs,
      heartbeatIntervalMs: streaming.heartbeatIntervalMs,
      reconnect: streaming.reconnect,
      logger,
      metricsCollector: this.options.metricsCollector,
    });
    const rest = new RestClient({ baseUrl: config.restUrl, credentials, fetchFn: this.options.fetchFn, logger });

    this.contexts.get(environment)?.session.close();
    this.contexts.set(environment, { config, account, rest, session });
    this.defaultEnvironment = environment;
    this.logger.info('Environment initialized', { environment });
  }

  /**
   * @throws {ValidationError} 環境が初期化されていない場合
   */
  setDefaultEnvironment(environment: Environment): void {
    this.context(environment);
    this.defaultEnvironment = environment;
  }

  getDefaultEnvironment(): Environment | null {
    return this.defaultEnvironment;
  }

  // --- REST ---

  getSegments(environment?: Environment): Promise<SegmentsResponse> {
    return this.context(environment).rest.getSegments();
  }

  getAllInstruments(environment?: Environment): Promise<InstrumentsResponse> {
    return this.context(environment).rest.getAllInstruments();
  }

  getDetailedInstruments(environment?: Environment): Promise<InstrumentsResponse> {
    return this.context(environment).rest.getDetailedInstruments();
  }

  getInstrumentDetails(
    ticker: string,
    market: Market = Market.ROFEX,
    environment?: Environment
  ): Promise<InstrumentDetailResponse> {
    return this.context(environment).rest.getInstrumentDetails(ticker, market);
  }

  getMarketData(query: MarketDataQuery, environment?: Environment): Promise<MarketDataResponse> {
    return this.context(environment).rest.getMarketData(query);
  }

  getTradeHistory(query: TradeHistoryQuery, environment?: Environment): Promise<TradesResponse> {
    return this.context(environment).rest.getTradeHistory(query);
  }

  getOrderStatus(clientOrderId: string, proprietary?: string, environment?: Environment): Promise<OrderStatusResponse> {
    const context = this.context(environment);
    return context.rest.getOrderStatus(clientOrderId, proprietary ?? context.config.proprietary);
  }

  getAllOrdersStatus(account?: string, environment?: Environment): Promise<OrdersResponse> {
    const context = this.context(environment);
    return context.rest.getAllOrdersByAccount(account ?? context.account);
  }

  sendOrder(order: ClientOrderRequest, environment?: Environment): Promise<OrderAckResponse> {
    const context = this.context(environment);
    return context.rest.sendOrder(withOrderDefaults(order, context.account));
  }

  cancelOrder(clientOrderId: string, proprietary?: string, environment?: Environment): Promise<OrderAckResponse> {
    const context = this.context(environment);
    return context.rest.cancelOrder(clientOrderId, proprietary ?? context.config.proprietary);
  }

  // --- WebSocket ---

  /**
   * ハンドラを登録してストリーミングセッションを開始する。開始済みならハンドラの登録のみ行う。
   */
  async initWebsocketConnection(handlers: WebsocketHandlers = {}, environment?: Environment): Promise<void> {
    const { session } = this.context(environment);
    if (handlers.marketData) {
      session.registry.register('market-data', handlers.marketData);
    }
    if (handlers.orderReport) {
      session.registry.register('order-report', handlers.orderReport);
    }
    if (handlers.error) {
      session.registry.register('error', handlers.error);
    }
    if (handlers.exception) {
      session.registry.setExceptionHandler(handlers.exception);
    }

    const state = session.getState();
    if (state === 'idle' || state === 'closed') {
      await session.start();
    }
  }

  closeWebsocketConnection(environment?: Environment): void {
    this.context(environment).session.close();
  }

  /**
   * @throws {ValidationError} 銘柄リストが空、または未知のエントリを含む場合
   */
  marketDataSubscription(
    tickers: readonly string[],
    entries?: readonly MarketDataEntry[],
    options: Omit<MarketDataSubscriptionSpec, 'tickers' | 'entries'> = {},
    environment?: Environment
  ): MarketDataSubscription {
    return this.context(environment).session.subscriptions.subscribeMarketData({ ...options, tickers, entries });
  }

  orderReportSubscription(
    account?: string,
    snapshotOnlyActive = true,
    environment?: Environment
  ): OrderReportSubscription {
    const context = this.context(environment);
    return context.session.subscriptions.subscribeOrderReports({
      account: account ?? context.account,
      snapshotOnlyActive,
    });
  }

  unsubscribe(subscriptionId: string, environment?: Environment): boolean {
    return this.context(environment).session.subscriptions.unsubscribe(subscriptionId);
  }

  addWebsocketMarketDataHandler(handler: MessageHandler<MarketDataMessage>, environment?: Environment): void {
    this.context(environment).session.registry.register('market-data', handler);
  }

  removeWebsocketMarketDataHandler(handler: MessageHandler<MarketDataMessage>, environment?: Environment): boolean {
    return this.context(environment).session.registry.remove('market-data', handler);
  }

  addWebsocketOrderReportHandler(handler: MessageHandler<OrderReportMessage>, environment?: Environment): void {
    this.context(environment).session.registry.register('order-report', handler);
  }

  removeWebsocketOrderReportHandler(handler: MessageHandler<OrderReportMessage>, environment?: Environment): boolean {
    return this.context(environment).session.registry.remove('order-report', handler);
  }

  addWebsocketErrorHandler(handler: MessageHandler<ErrorMessage>, environment?: Environment): void {
    this.context(environment).session.registry.register('error', handler);
  }

  removeWebsocketErrorHandler(handler: MessageHandler<ErrorMessage>, environment?: Environment): boolean {
    return this.context(environment).session.registry.remove('error', handler);
  }

  setWebsocketExceptionHandler(handler: ExceptionHandler | null, environment?: Environment): void {
    this.context(environment).session.registry.setExceptionHandler(handler);
  }

  sendOrderViaWebsocket(order: ClientOrderRequest, environment?: Environment): void {
    const context = this.context(environment);
    context.session.sendOrder(withOrderDefaults(order, context.account));
  }

  cancelOrderViaWebsocket(clientOrderId: string, proprietary?: string, environment?: Environment): void {
    const context = this.context(environment);
    context.session.cancelOrder(clientOrderId, proprietary ?? context.config.proprietary);
  }

  getStreamingSession(environment?: Environment): StreamingSession {
    return this.context(environment).session;
  }

  /**
   * すべての環境のセッションを閉じる。
   */
  shutdown(): void {
    for (const [environment, context] of this.contexts) {
      context.session.close();
      this.logger.info('Environment closed', { environment });
    }
  }

  private context(environment?: Environment): EnvironmentContext {
    const target = environment ?? this.defaultEnvironment;
    if (target === null) {
      throw new ValidationError('The environment is not initialized.');
    }
    const context = this.contexts.get(target);
    if (!context) {
      throw new ValidationError(`The environment ${target} is not initialized.`);
    }
    return context;
  }
}

function withOrderDefaults(order: ClientOrderRequest, account: string): OrderRequest {
  return {
    ...order,
    account: order.account ?? account,
    market: order.market ?? Market.ROFEX,
    orderType: order.orderType ?? OrderType.LIMIT,
    timeInForce: order.timeInForce ?? TimeInForce.DAY,
    cancelPrevious: order.cancelPrevious ?? false,
    iceberg: order.iceberg ?? false,
  };
}
