import pino from 'pino';
import { beforeEach, describe, expect, it } from 'vitest';
import { PinoLogger } from '@/infra/logger/PinoLogger';

/**
 * 単体テスト: PinoLogger
 *
 * 出力先をメモリ上のストリームにして、書き出された JSON 行を検証する。
 */
describe('PinoLogger', () => {
  let lines: string[];
  let logger: PinoLogger;

  function records(): Array<Record<string, unknown>> {
    return lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
    });
  }

  beforeEach(() => {
    lines = [];
    logger = new PinoLogger(
      pino(
        { level: 'info', base: null },
        {
          write: (line: string) => {
            lines.push(line);
          },
        }
      )
    );
  });

  it('メッセージとメタ情報を 1 行の JSON に出力する', () => {
    logger.info('Subscription sent', { id: 'sub-1' });

    expect(records()).toEqual([expect.objectContaining({ level: 30, msg: 'Subscription sent', id: 'sub-1' })]);
  });

  it('設定レベル未満は出力しない', () => {
    logger.debug('hidden');
    logger.warn('shown');

    expect(records().map((record) => record.msg)).toEqual(['shown']);
  });

  it('子ロガーはバインディングを引き継ぐ', () => {
    logger.child({ component: 'StreamingSession' }).error('Connection lost');

    expect(records()).toEqual([
      expect.objectContaining({ level: 50, component: 'StreamingSession', msg: 'Connection lost' }),
    ]);
  });

  it('err はエラーとしてシリアライズされる', () => {
    logger.error('Reconnect attempt failed', { err: new Error('boom') });

    expect(records()[0]?.err).toEqual(expect.objectContaining({ type: 'Error', message: 'boom' }));
  });
});
