import WebSocket from 'ws';
import type { Logger } from '@/application/interfaces/Logger';
import { AuthenticationError, type RofexError, TransportError } from '@/domain/errors';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import type { ConnectOptions, WebSocketConnection, WebSocketConnector } from './interfaces/WebSocketConnection';
import { WsWebSocketConnection } from './WsWebSocketConnection';

/**
 * インフラ層: ws による接続確立
 *
 * 責務: 接続が開くまで待ち、失敗をドメインのエラーに変換する。
 * - 401 / 403 でのアップグレード拒否 → AuthenticationError
 * - それ以外の応答・ネットワークエラー・ハンドシェイクのタイムアウト → TransportError
 */
export class WsWebSocketConnector implements WebSocketConnector {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'WsWebSocketConnector' });
  }

  connect(url: string, options: ConnectOptions): Promise<WebSocketConnection> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, {
        headers: options.headers,
        handshakeTimeout: options.handshakeTimeoutMs,
      });
      const connection = new WsWebSocketConnection(socket);
      let settled = false;

      const fail = (error: RofexError): void => {
        if (settled) {
          return;
        }
        settled = true;
        connection.removeAllListeners();
        connection.terminate();
        this.logger.warn('WebSocket handshake failed', { url, err: error });
        reject(error);
      };

      connection.onOpen(() => {
        if (settled) {
          return;
        }
        settled = true;
        // 以降のイベントはセッションが登録する
        connection.removeAllListeners();
        this.logger.debug('WebSocket connected', { url });
        resolve(connection);
      });

      connection.onUnexpectedResponse((statusCode) => {
        fail(
          statusCode === 401 || statusCode === 403
            ? new AuthenticationError(`WebSocket upgrade rejected with status ${statusCode}`)
            : new TransportError(`unexpected WebSocket upgrade response: ${statusCode}`)
        );
      });

      connection.onError((error) => {
        fail(new TransportError(`WebSocket connection failed: ${error.message}`, { cause: error }));
      });

      connection.onClose((info) => {
        fail(new TransportError(`WebSocket closed during handshake (code ${info.code})`));
      });
    });
  }
}
