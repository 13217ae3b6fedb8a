import { Registry } from 'prom-client';
import { beforeEach, describe, expect, it } from 'vitest';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';

/**
 * 単体テスト: PrometheusMetricsCollector
 */
describe('PrometheusMetricsCollector', () => {
  let collector: PrometheusMetricsCollector;

  beforeEach(() => {
    collector = new PrometheusMetricsCollector(new Registry());
  });

  it('受信・送信・エラーをラベル別に数える', async () => {
    collector.incrementReceived('market-data');
    collector.incrementReceived('market-data');
    collector.incrementReceived('order-report');
    collector.incrementSent('subscribe-market-data');
    collector.incrementError('protocol_error');

    const lines = (await collector.getMetrics()).split('\n');

    expect(lines).toContain('rofex_frames_received_total{category="market-data"} 2');
    expect(lines).toContain('rofex_frames_received_total{category="order-report"} 1');
    expect(lines).toContain('rofex_frames_sent_total{type="subscribe-market-data"} 1');
    expect(lines).toContain('rofex_errors_total{error_type="protocol_error"} 1');
  });

  it('再接続の試行回数を数える', async () => {
    collector.incrementReconnect();
    collector.incrementReconnect();

    const lines = (await collector.getMetrics()).split('\n');

    expect(lines).toContain('rofex_reconnect_attempts_total 2');
  });

  it('インスタンスごとにレジストリが分かれる', async () => {
    const other = new PrometheusMetricsCollector();
    collector.incrementReconnect();

    expect((await other.getMetrics()).split('\n')).toContain('rofex_reconnect_attempts_total 0');
  });
});
