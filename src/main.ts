import 'dotenv/config';
import process from 'node:process';
import { TransportError } from '@/domain/errors';
import { loadEnvironmentOverrides, parseEnvironment } from '@/infra/config/environments';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { RofexClient } from '@/presentation/client/RofexClient';

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @param key 環境変数名
 * @returns 環境変数の値
 * @throws {Error} 環境変数が未設定の場合
 */
function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * エントリーポイント: マーケットデータと約定レポートを購読してログに流すサンプル
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - クライアントの初期化とハンドラの配線
 * - シグナルハンドリング
 */
async function bootstrap(): Promise<void> {
  const logger = LoggerFactory.create();
  const environment = parseEnvironment(process.env.ROFEX_ENVIRONMENT ?? 'REMARKET');
  const user = requireEnv('ROFEX_USER');
  const password = requireEnv('ROFEX_PASSWORD');
  const account = requireEnv('ROFEX_ACCOUNT');
  const tickers = requireEnv('ROFEX_TICKERS')
    .split(',')
    .map((ticker) => ticker.trim())
    .filter(Boolean);

  const metrics = new PrometheusMetricsCollector();
  const client = new RofexClient({ logger, metricsCollector: metrics });

  const shutdown = async (code = 0): Promise<void> => {
    logger.info('Shutting down', { metrics: await metrics.getMetrics() });
    client.shutdown();
    process.exit(code);
  };

  await client.initialize({
    user,
    password,
    account,
    environment,
    overrides: loadEnvironmentOverrides(environment),
  });

  await client.initWebsocketConnection({
    marketData: (message) => {
      logger.info('Market data', { instrument: message.instrument, entries: message.entries });
    },
    orderReport: (message) => {
      logger.info('Order report', {
        clOrdId: message.report.clOrdId,
        status: message.report.status,
      });
    },
    error: (message) => {
      logger.warn('Error message received', { code: message.code, description: message.description });
    },
    exception: (error) => {
      logger.error('Streaming exception', { err: error });
      // 再接続を諦めたら終了する
      if (error instanceof TransportError && error.terminal) {
        void shutdown(1);
      }
    },
  });

  client.marketDataSubscription(tickers);
  client.orderReportSubscription();

  // SIGINT/SIGTERM でセッションを閉じる
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to bootstrap rofex client:', error);
  process.exit(1);
});
