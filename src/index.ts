export { DispatchRegistry } from './application/dispatch/DispatchRegistry';
export type { CredentialProvider } from './application/interfaces/CredentialProvider';
export type { Logger } from './application/interfaces/Logger';
export type { FrameData, MessageCodec } from './application/interfaces/MessageCodec';
export type { ExceptionHandler, MessageHandler } from './application/interfaces/MessageHandler';
export type { MetricsCollector } from './application/interfaces/MetricsCollector';
export { type FrameSender, SubscriptionManager } from './application/subscriptions/SubscriptionManager';
export {
  ApiError,
  AuthenticationError,
  HandlerError,
  ProtocolError,
  RofexError,
  TokenExpiredError,
  TransportError,
  ValidationError,
} from './domain/errors';
export {
  type DecodedFrame,
  ErrorCode,
  type ErrorMessage,
  type InboundMessage,
  type MarketDataEntries,
  type MarketDataMessage,
  type MessageCategory,
  type OrderReport,
  type OrderReportMessage,
  type PriceLevel,
} from './domain/models/InboundMessage';
export type { OrderRequest } from './domain/models/Order';
export type { OutboundRequest } from './domain/models/OutboundRequest';
export type {
  MarketDataSubscription,
  MarketDataSubscriptionSpec,
  OrderReportSubscription,
  OrderReportSubscriptionSpec,
  Subscription,
} from './domain/models/Subscription';
export { isTokenExpired, type Token } from './domain/models/Token';
export {
  ALL_MARKET_DATA_ENTRIES,
  Environment,
  type InstrumentId,
  Market,
  MarketDataEntry,
  OrderType,
  Side,
  TimeInForce,
} from './domain/types';
export { RestCredentialProvider } from './infra/auth/RestCredentialProvider';
export { PrimaryMessageCodec } from './infra/codec/PrimaryMessageCodec';
export {
  ENVIRONMENTS,
  type EnvironmentConfig,
  loadEnvironmentOverrides,
  parseEnvironment,
  resolveEnvironmentConfig,
} from './infra/config/environments';
export { DEFAULT_STREAMING_SETTINGS, type StreamingSettings } from './infra/config/streaming';
export { LoggerFactory } from './infra/logger/LoggerFactory';
export { PinoLogger } from './infra/logger/PinoLogger';
export { PrometheusMetricsCollector } from './infra/metrics/PrometheusMetricsCollector';
export { RestClient } from './infra/rest/RestClient';
export type { WebSocketConnection, WebSocketConnector } from './infra/websocket/interfaces/WebSocketConnection';
export { WsWebSocketConnector } from './infra/websocket/WsWebSocketConnector';
export {
  type ClientOrderRequest,
  type InitializeParams,
  RofexClient,
  type RofexClientOptions,
  type WebsocketHandlers,
} from './presentation/client/RofexClient';
export { type HandshakeMode, type SessionState, StreamingSession } from './presentation/websocket/StreamingSession';
