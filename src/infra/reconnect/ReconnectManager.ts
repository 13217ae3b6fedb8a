import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type BackoffOptions, BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';

export interface ReconnectOptions extends BackoffOptions {
  /** 諦めるまでの試行回数 */
  maxAttempts: number;
}

export interface ReconnectCallbacks {
  /** 試行が失敗するたびに呼ばれる（attempt は 1 始まり） */
  onAttemptFailed?: (error: unknown, attempt: number) => void;
  /** 試行回数を使い切ったときに一度だけ呼ばれる */
  onExhausted: (lastError: unknown, attempts: number) => void;
}

export const DEFAULT_RECONNECT_OPTIONS: ReconnectOptions = {
  maxAttempts: 10,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * インフラ層: 再接続スケジューラ（connect 関数を受け取って再試行）
 *
 * 責務: 再接続のスケジュール管理。失敗時はバックオフ後に再試行し、
 * 上限回数に達したら onExhausted で打ち切りを通知する。
 */
export class ReconnectManager {
  private readonly backoff: BackoffStrategy;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = false;
  private attempts = 0;
  private lastError: unknown = null;
  private readonly logger: Logger;

  /**
   * @param connectFn 再接続時に実行する接続関数（失敗時は reject する）
   * @param callbacks 失敗・打ち切りの通知先
   * @param options 試行回数とバックオフの設定
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    private readonly connectFn: () => Promise<void>,
    private readonly callbacks: ReconnectCallbacks,
    private readonly options: ReconnectOptions = DEFAULT_RECONNECT_OPTIONS,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.backoff = new BackoffStrategy(options);
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'ReconnectManager' });
  }

  /**
   * 直近の障害以降に行った試行回数
   */
  get attemptCount(): number {
    return this.attempts;
  }

  /**
   * 再接続をスケジュールする。
   * 停止済みなら何もしない。試行回数を使い切っていれば停止して onExhausted を呼ぶ。
   */
  scheduleReconnect(): void {
    if (this.stopped) {
      return;
    }
    if (this.attempts >= this.options.maxAttempts) {
      this.stop();
      this.logger.error('Reconnect attempts exhausted', { attempts: this.attempts });
      this.callbacks.onExhausted(this.lastError, this.attempts);
      return;
    }

    const delay = this.backoff.getNextDelay();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
    }
    this.logger.info('Reconnect scheduled', { delayMs: delay, attempt: this.attempts + 1 });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.safeConnect();
    }, delay);
  }

  /**
   * 再接続管理を停止する。
   */
  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  /**
   * 停止状態と試行回数を初期化する（セッションの再開時に呼ぶ）。
   */
  reset(): void {
    this.stop();
    this.stopped = false;
    this.attempts = 0;
    this.lastError = null;
    this.backoff.reset();
  }

  /**
   * 安全に接続を試みる。
   * 成功時はバックオフと試行回数をリセットし、失敗時は再接続をスケジュールする。
   */
  private async safeConnect(): Promise<void> {
    this.attempts += 1;
    const attempt = this.attempts;
    this.metricsCollector?.incrementReconnect();

    try {
      await this.connectFn();
      this.attempts = 0;
      this.lastError = null;
      this.backoff.reset();
    } catch (error) {
      if (this.stopped) {
        return;
      }
      this.lastError = error;
      this.logger.error('Reconnect attempt failed', { err: error, attempt });
      this.callbacks.onAttemptFailed?.(error, attempt);
      this.scheduleReconnect();
    }
  }
}
