import type { FrameData } from '@/application/interfaces/MessageCodec';

export interface CloseInfo {
  code: number;
  reason: string;
}

/**
 * インフラ層: WebSocket 接続ラッパ（インターフェース）
 *
 * 責務: 接続のイベント処理と送信を抽象化する。セッションは実装（ws）に依存しない。
 */
export interface WebSocketConnection {
  /**
   * 接続が確立されたときに呼ばれるコールバック
   */
  onOpen(callback: () => void): void;

  /**
   * メッセージを受信したときに呼ばれるコールバック
   */
  onMessage(callback: (data: FrameData) => void): void;

  /**
   * 接続が閉じられたときに呼ばれるコールバック
   */
  onClose(callback: (info: CloseInfo) => void): void;

  /**
   * エラーが発生したときに呼ばれるコールバック。通常は直後に onClose も呼ばれる。
   */
  onError(callback: (error: Error) => void): void;

  send(data: string): void;

  /**
   * 生存確認の ping を送る（開いていなければ何もしない）
   */
  ping(): void;

  close(code?: number, reason?: string): void;

  /**
   * すべてのイベントリスナーを削除する
   */
  removeAllListeners(): void;

  /**
   * 接続を強制終了する
   */
  terminate(): void;
}

export interface ConnectOptions {
  /** アップグレード要求に付与するヘッダ */
  headers?: Record<string, string>;
  /** ハンドシェイク完了までの待ち時間 */
  handshakeTimeoutMs: number;
}

/**
 * 接続の確立を担う。テストではインプロセスの偽物に差し替える。
 */
export interface WebSocketConnector {
  /**
   * @throws {AuthenticationError} サーバーが 401/403 でアップグレードを拒否した場合
   * @throws {TransportError} それ以外の理由で接続できなかった場合
   */
  connect(url: string, options: ConnectOptions): Promise<WebSocketConnection>;
}
