export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * インフラ層: 指数バックオフ戦略の実装
 *
 * 再接続時の遅延を base × 2^n で増やし、上限で頭打ちにする。
 */
export class BackoffStrategy {
  private attempt = 0;

  constructor(private readonly options: BackoffOptions = { baseDelayMs: 1000, maxDelayMs: 30000 }) {}

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   */
  getNextDelay(): number {
    const delay = Math.min(this.options.baseDelayMs * 2 ** this.attempt, this.options.maxDelayMs);
    this.attempt += 1;
    return delay;
  }

  /**
   * バックオフカウンターをリセットする。
   * 接続成功時に呼び出される。
   */
  reset(): void {
    this.attempt = 0;
  }
}
