import { DispatchRegistry } from '@/application/dispatch/DispatchRegistry';
import type { CredentialProvider } from '@/application/interfaces/CredentialProvider';
import type { Logger } from '@/application/interfaces/Logger';
import type { FrameData, MessageCodec } from '@/application/interfaces/MessageCodec';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { type FrameSender, SubscriptionManager } from '@/application/subscriptions/SubscriptionManager';
import { AuthenticationError, ProtocolError, TransportError } from '@/domain/errors';
import type { DecodedFrame, InboundMessage, LoginResponseMessage } from '@/domain/models/InboundMessage';
import type { OrderRequest } from '@/domain/models/Order';
import type { OutboundRequestType } from '@/domain/models/OutboundRequest';
import type { Token } from '@/domain/models/Token';
import { PrimaryMessageCodec } from '@/infra/codec/PrimaryMessageCodec';
import { DEFAULT_STREAMING_SETTINGS } from '@/infra/config/streaming';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { ReconnectManager, type ReconnectOptions } from '@/infra/reconnect/ReconnectManager';
import type {
  CloseInfo,
  WebSocketConnection,
  WebSocketConnector,
} from '@/infra/websocket/interfaces/WebSocketConnection';
import { WsWebSocketConnector } from '@/infra/websocket/WsWebSocketConnector';

export type SessionState =
  | 'idle'
  | 'connecting'
  | 'authenticating'
  | 'active'
  | 'reconnecting'
  | 'closing'
  | 'closed';

/**
 * 認証方式
 * - header: アップグレード要求の X-Auth-Token で認証し、接続の確立を受理とみなす
 * - login-frame: 接続後にログインフレームを送り、応答を待つ
 */
export type HandshakeMode = 'header' | 'login-frame';

export interface StreamingSessionOptions {
  url: string;
  credentials: CredentialProvider;
  codec?: MessageCodec;
  connector?: WebSocketConnector;
  registry?: DispatchRegistry;
  handshakeMode?: HandshakeMode;
  authTimeoutMs?: number;
  /** 0 で ping を送らない */
  heartbeatIntervalMs?: number;
  reconnect?: Partial<ReconnectOptions>;
  onStateChange?: (state: SessionState, previous: SessionState) => void;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

interface PendingLogin {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * プレゼンテーション層: ストリーミングセッション
 *
 * 責務:
 * - 接続のライフサイクル（Idle → Connecting → Authenticating → Active → Closing → Closed、Reconnecting）
 * - 受信フレームの復号と配信
 * - 切断時の再接続（指数バックオフ、回数上限あり）と購読の再送
 *
 * 状態遷移の規則:
 * - Active になる前に届いたフレームは保留し、購読の再送後に到着順で配信する
 * - 送信は Active のときだけ受け付ける
 * - Closing 以降はフレームを配信しない
 * - 古い接続のイベントは無視する（this.connection と一致するものだけ処理）
 */
export class StreamingSession implements FrameSender {
  readonly registry: DispatchRegistry;
  readonly subscriptions: SubscriptionManager;

  private state: SessionState = 'idle';
  private connection: WebSocketConnection | null = null;
  private inbox: InboundMessage[] = [];
  private pendingLogin: PendingLogin | null = null;
  private lastTransportError: Error | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  /** start() と close() のたびに進める。await から戻った試行が現役かどうかの判定に使う */
  private generation = 0;
  /** Active への遷移通知中は購読を即時送信せず、再送に任せる */
  private activating = false;

  private readonly codec: MessageCodec;
  private readonly connector: WebSocketConnector;
  private readonly reconnectManager: ReconnectManager;
  private readonly handshakeMode: HandshakeMode;
  private readonly authTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: StreamingSessionOptions) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'StreamingSession' });
    this.codec = options.codec ?? new PrimaryMessageCodec();
    this.connector = options.connector ?? new WsWebSocketConnector(this.logger);
    this.registry = options.registry ?? new DispatchRegistry(this.logger, options.metricsCollector);
    this.subscriptions = new SubscriptionManager(this.codec, this, this.logger);
    this.handshakeMode = options.handshakeMode ?? 'header';
    this.authTimeoutMs = options.authTimeoutMs ?? DEFAULT_STREAMING_SETTINGS.authTimeoutMs;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? DEFAULT_STREAMING_SETTINGS.heartbeatIntervalMs;

    this.reconnectManager = new ReconnectManager(
      () => this.reconnectOnce(),
      {
        onAttemptFailed: (error, attempt) => {
          this.registry.reportException(
            new TransportError(`reconnect attempt ${attempt} failed: ${describeError(error)}`, { cause: error })
          );
        },
        onExhausted: (lastError, attempts) => this.handleExhausted(lastError, attempts),
      },
      { ...DEFAULT_STREAMING_SETTINGS.reconnect, ...options.reconnect },
      this.logger,
      options.metricsCollector
    );
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * 接続・認証して Active にする。
   * 失敗した場合は Closed に遷移し、Active を経由せずに reject する。
   * @throws {AuthenticationError} トークン取得・ハンドシェイク・ログインが拒否された場合
   * @throws {TransportError} 接続できなかった場合
   */
  async start(): Promise<void> {
    if (this.state !== 'idle' && this.state !== 'closed') {
      throw new TransportError(`cannot start session in state ${this.state}`);
    }
    const generation = ++this.generation;
    this.reconnectManager.reset();

    try {
      const token = await this.options.credentials.getToken();
      await this.establish(token, generation);
    } catch (error) {
      // close() や次の start() に追い越された試行は、後の試行の接続と状態に触れない
      if (generation === this.generation) {
        this.releaseConnection();
        this.transition('closed');
      }
      throw error;
    }
    if (generation !== this.generation) {
      throw new TransportError('session closed while connecting');
    }
    this.activate();
  }

  /**
   * セッションを終了する。保留フレームと購読は破棄され、以降は何も配信しない。
   */
  close(): void {
    if (this.state === 'idle' || this.state === 'closed' || this.state === 'closing') {
      return;
    }
    this.generation += 1;
    this.transition('closing');
    this.reconnectManager.stop();
    this.stopHeartbeat();
    this.inbox = [];
    if (this.pendingLogin) {
      this.pendingLogin.reject(new TransportError('session closed during authentication'));
      this.pendingLogin = null;
    }
    this.releaseConnection();
    this.subscriptions.clear();
    this.transition('closed');
  }

  isActive(): boolean {
    return this.state === 'active' && this.connection !== null && !this.activating;
  }

  /**
   * @throws {TransportError} Active でない場合
   */
  send(frame: string, type: OutboundRequestType): void {
    if (this.state !== 'active' || !this.connection) {
      throw new TransportError(`cannot send ${type} while session is ${this.state}`);
    }
    this.write(this.connection, frame, type);
  }

  /**
   * WebSocket 経由で新規注文を送る。
   * @throws {ValidationError} 注文内容が不正な場合
   * @throws {TransportError} Active でない場合
   */
  sendOrder(order: OrderRequest): void {
    this.send(this.codec.encode({ type: 'new-order', order }), 'new-order');
  }

  /**
   * WebSocket 経由で注文を取り消す。
   */
  cancelOrder(clientOrderId: string, proprietary: string): void {
    this.send(this.codec.encode({ type: 'cancel-order', clientOrderId, proprietary }), 'cancel-order');
  }

  /**
   * 接続して認証まで進める。await から戻るたびに世代を確かめ、
   * 追い越されていれば自分が作った接続だけを捨てて TransportError にする。
   */
  private async establish(token: Token, generation: number): Promise<void> {
    if (generation !== this.generation) {
      throw new TransportError('session closed while connecting');
    }
    this.inbox = [];
    this.transition('connecting');
    const connection = await this.connector.connect(this.options.url, {
      headers: { 'X-Auth-Token': token.value },
      handshakeTimeoutMs: this.authTimeoutMs,
    });

    if (generation !== this.generation || this.state !== 'connecting') {
      // 接続待ちの間に close() された
      connection.terminate();
      throw new TransportError('session closed while connecting');
    }

    this.connection = connection;
    connection.onMessage((data) => this.receive(connection, data));
    connection.onClose((info) => this.handleClose(connection, info));
    connection.onError((error) => this.handleTransportError(connection, error));

    this.transition('authenticating');
    if (this.handshakeMode === 'login-frame') {
      await this.authenticate(connection, token);
      if (generation !== this.generation) {
        throw new TransportError('session closed during authentication');
      }
    }
  }

  private authenticate(connection: WebSocketConnection, token: Token): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingLogin = null;
        reject(new AuthenticationError(`login acknowledgement not received within ${this.authTimeoutMs}ms`));
      }, this.authTimeoutMs);

      this.pendingLogin = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      this.write(connection, this.codec.encode({ type: 'login', token: token.value }), 'login');
    });
  }

  private activate(): void {
    this.activating = true;
    try {
      this.transition('active');
    } finally {
      this.activating = false;
    }
    if (this.state !== 'active') {
      // 通知の中で close() された
      return;
    }
    const replayed = this.subscriptions.replay();
    if (replayed > 0) {
      this.logger.info('Subscriptions replayed', { count: replayed });
    }
    this.startHeartbeat();
    this.flushInbox();
  }

  private receive(connection: WebSocketConnection, data: FrameData): void {
    if (connection !== this.connection || this.state === 'closing' || this.state === 'closed') {
      return;
    }

    let frame: DecodedFrame;
    try {
      frame = this.codec.decode(data);
    } catch (error) {
      this.handleDecodeFailure(connection, data, error);
      return;
    }

    if (frame.category === 'login') {
      this.settleLogin(frame);
      return;
    }

    this.options.metricsCollector?.incrementReceived(frame.category);
    if (this.state !== 'active') {
      this.inbox.push(frame);
      return;
    }
    this.deliver(frame);
  }

  private deliver(message: InboundMessage): void {
    if (message.category === 'error' && message.protocolError) {
      this.logger.warn('Undecodable frame', { code: message.code, description: message.description });
      this.options.metricsCollector?.incrementError('protocol_error');
    }
    this.registry.dispatch(message, () => this.state === 'active');
  }

  private flushInbox(): void {
    while (this.inbox.length > 0 && this.state === 'active') {
      const next = this.inbox.shift();
      if (next) {
        this.deliver(next);
      }
    }
  }

  private settleLogin(frame: LoginResponseMessage): void {
    const pending = this.pendingLogin;
    if (!pending) {
      this.logger.debug('Ignoring unsolicited login response');
      return;
    }
    this.pendingLogin = null;
    if (frame.accepted) {
      pending.resolve();
    } else {
      pending.reject(new AuthenticationError(frame.description ?? 'login rejected'));
    }
  }

  /**
   * コーデック自体が失敗した場合は接続を捨てて再接続する。
   */
  private handleDecodeFailure(connection: WebSocketConnection, data: FrameData, error: unknown): void {
    const raw = typeof data === 'string' ? data : '';
    this.logger.error('Frame decoding failed', { err: error });
    this.options.metricsCollector?.incrementError('protocol_error');
    this.registry.reportException(new ProtocolError(`frame decoding failed: ${describeError(error)}`, raw, { cause: error }));
    connection.removeAllListeners();
    connection.terminate();
    this.handleClose(connection, { code: 1006, reason: 'decode failure' });
  }

  private handleTransportError(connection: WebSocketConnection, error: Error): void {
    if (connection !== this.connection) {
      return;
    }
    // 直後の close で状態遷移する
    this.lastTransportError = error;
    this.logger.warn('WebSocket error', { err: error });
  }

  private handleClose(connection: WebSocketConnection, info: CloseInfo): void {
    if (connection !== this.connection) {
      return;
    }
    this.connection = null;
    connection.removeAllListeners();
    this.stopHeartbeat();
    const cause = this.lastTransportError;
    this.lastTransportError = null;

    if (this.state === 'authenticating') {
      if (this.pendingLogin) {
        this.pendingLogin.reject(new TransportError(`connection closed during authentication (code ${info.code})`));
        this.pendingLogin = null;
      }
      return;
    }
    if (this.state !== 'active') {
      return;
    }

    const error = new TransportError(
      `connection closed unexpectedly (code ${info.code}${info.reason ? `, ${info.reason}` : ''})`,
      cause ? { cause } : undefined
    );
    this.logger.warn('Connection lost', { code: info.code, reason: info.reason });
    this.options.metricsCollector?.incrementError('transport_error');
    this.transition('reconnecting');
    this.registry.reportException(error);
    this.reconnectManager.scheduleReconnect();
  }

  private async reconnectOnce(): Promise<void> {
    if (this.state !== 'reconnecting') {
      return;
    }
    const generation = this.generation;
    try {
      const token = await this.options.credentials.getToken();
      if (generation !== this.generation) {
        return;
      }
      await this.establish(token, generation);
    } catch (error) {
      if (generation !== this.generation) {
        return;
      }
      this.releaseConnection();
      if (error instanceof AuthenticationError) {
        // 次の試行ではトークンを取り直す
        this.options.credentials.invalidate();
      }
      this.transition('reconnecting');
      throw error;
    }
    if (generation !== this.generation) {
      return;
    }
    this.activate();
  }

  private handleExhausted(lastError: unknown, attempts: number): void {
    this.transition('closed');
    this.registry.reportException(
      new TransportError(`reconnect failed after ${attempts} attempts`, { cause: lastError, terminal: true })
    );
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    if (this.heartbeatIntervalMs <= 0) {
      return;
    }
    this.heartbeatTimer = setInterval(() => {
      this.connection?.ping();
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private releaseConnection(): void {
    const connection = this.connection;
    if (!connection) {
      return;
    }
    this.connection = null;
    this.inbox = [];
    connection.removeAllListeners();
    connection.close(1000, 'client closing');
  }

  private write(connection: WebSocketConnection, frame: string, type: OutboundRequestType): void {
    connection.send(frame);
    this.options.metricsCollector?.incrementSent(type);
    this.logger.debug('Frame sent', { type });
  }

  private transition(next: SessionState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.logger.info('Session state changed', { from: previous, to: next });
    this.options.onStateChange?.(next, previous);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
