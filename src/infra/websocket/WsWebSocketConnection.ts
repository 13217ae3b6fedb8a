import type { IncomingMessage } from 'node:http';
import type { FrameData } from '@/application/interfaces/MessageCodec';
import type { CloseInfo, WebSocketConnection } from './interfaces/WebSocketConnection';

const OPEN = 1;

/**
 * ws のソケットのうち、この接続ラッパが使う部分
 */
export interface RawSocket {
  readonly readyState: number;
  on(event: 'open', listener: () => void): this;
  on(event: 'message', listener: (data: FrameData, isBinary: boolean) => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'unexpected-response', listener: (request: unknown, response: IncomingMessage) => void): this;
  send(data: string): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

/**
 * ws パッケージを使った WebSocket 接続の実装
 */
export class WsWebSocketConnection implements WebSocketConnection {
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(data: FrameData) => void> = [];
  private closeCallbacks: Array<(info: CloseInfo) => void> = [];
  private errorCallbacks: Array<(error: Error) => void> = [];
  private unexpectedResponseCallbacks: Array<(statusCode: number) => void> = [];

  constructor(private readonly socket: RawSocket) {
    // ソケットのリスナーは常に残す（error リスナーが無いと ws が例外を投げるため）
    this.socket.on('open', () => {
      for (const cb of [...this.openCallbacks]) {
        cb();
      }
    });

    this.socket.on('message', (data) => {
      for (const cb of [...this.messageCallbacks]) {
        cb(data);
      }
    });

    this.socket.on('close', (code, reason) => {
      const info: CloseInfo = { code, reason: reason.toString('utf8') };
      for (const cb of [...this.closeCallbacks]) {
        cb(info);
      }
    });

    this.socket.on('error', (error) => {
      for (const cb of [...this.errorCallbacks]) {
        cb(error);
      }
    });

    this.socket.on('unexpected-response', (_request, response) => {
      const statusCode = response.statusCode ?? 0;
      response.resume();
      for (const cb of [...this.unexpectedResponseCallbacks]) {
        cb(statusCode);
      }
    });
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (data: FrameData) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (info: CloseInfo) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (error: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  /**
   * ハンドシェイクが 101 以外で応答されたときに呼ばれるコールバック
   */
  onUnexpectedResponse(callback: (statusCode: number) => void): void {
    this.unexpectedResponseCallbacks.push(callback);
  }

  send(data: string): void {
    this.socket.send(data);
  }

  ping(): void {
    if (this.socket.readyState === OPEN) {
      this.socket.ping();
    }
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  removeAllListeners(): void {
    this.openCallbacks = [];
    this.messageCallbacks = [];
    this.closeCallbacks = [];
    this.errorCallbacks = [];
    this.unexpectedResponseCallbacks = [];
  }

  terminate(): void {
    this.socket.terminate();
  }
}
