/**
 * メトリクス収集インターフェース
 *
 * 責務: セッションの送受信・エラー・再接続の計数を抽象化。
 * 指定しなければ計数は行わない。
 */
export interface MetricsCollector {
  /**
   * 受信フレーム数をカウント
   * @param category 受信メッセージの分類（market-data, order-report, error）
   */
  incrementReceived(category: string): void;

  /**
   * 送信フレーム数をカウント
   * @param type 要求種別（subscribe-market-data, new-order など）
   */
  incrementSent(type: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラー種別（handler_error, protocol_error, transport_error）
   */
  incrementError(errorType: string): void;

  /**
   * 再接続試行回数をカウント
   */
  incrementReconnect(): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;
}
