import { DEFAULT_RECONNECT_OPTIONS, type ReconnectOptions } from '@/infra/reconnect/ReconnectManager';

/**
 * ストリーミングセッションの既定値
 */
export interface StreamingSettings {
  /** ハンドシェイク（ヘッダ認証）またはログイン応答の待ち時間 */
  authTimeoutMs: number;
  /** ping の間隔。0 で無効 */
  heartbeatIntervalMs: number;
  reconnect: ReconnectOptions;
}

export const DEFAULT_STREAMING_SETTINGS: StreamingSettings = {
  authTimeoutMs: 5000,
  heartbeatIntervalMs: 30000,
  reconnect: DEFAULT_RECONNECT_OPTIONS,
};

/** トークンの有効期間の既定値（24 時間） */
export const DEFAULT_TOKEN_TTL_MS = 24 * 60 * 60 * 1000;
