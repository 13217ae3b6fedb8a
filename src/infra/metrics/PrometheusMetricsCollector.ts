import { Counter, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、インスタンスごとにレジストリを持つ。
 *
 * 責務: prom-client を使用してセッションのメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter<'category'>;
  private readonly sentCounter: Counter<'type'>;
  private readonly errorCounter: Counter<'error_type'>;
  private readonly reconnectCounter: Counter;

  /**
   * @param register 登録先レジストリ（省略時は専用レジストリを作成）
   */
  constructor(register: Registry = new Registry()) {
    this.register = register;

    this.receivedCounter = new Counter({
      name: 'rofex_frames_received_total',
      help: 'Total number of frames received from the streaming session',
      labelNames: ['category'],
      registers: [this.register],
    });

    this.sentCounter = new Counter({
      name: 'rofex_frames_sent_total',
      help: 'Total number of frames sent over the streaming session',
      labelNames: ['type'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'rofex_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });

    this.reconnectCounter = new Counter({
      name: 'rofex_reconnect_attempts_total',
      help: 'Total number of reconnect attempts',
      registers: [this.register],
    });
  }

  incrementReceived(category: string): void {
    this.receivedCounter.inc({ category });
  }

  incrementSent(type: string): void {
    this.sentCounter.inc({ type });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  incrementReconnect(): void {
    this.reconnectCounter.inc();
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }
}
