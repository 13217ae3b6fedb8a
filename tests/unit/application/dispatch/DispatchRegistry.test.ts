import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DispatchRegistry } from '@/application/dispatch/DispatchRegistry';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { HandlerError, type RofexError, TransportError } from '@/domain/errors';
import type { ErrorMessage, MarketDataMessage, OrderReportMessage } from '@/domain/models/InboundMessage';

/**
 * 単体テスト: DispatchRegistry
 *
 * - カテゴリ別・登録順の配信
 * - ハンドラの失敗の隔離と例外ハンドラへの通知
 * - 配信中の登録変更とガード
 */
describe('DispatchRegistry', () => {
  let loggerMock: LoggerMock;
  let metrics: MetricsCollector;
  let registry: DispatchRegistry;

  const marketData: MarketDataMessage = {
    category: 'market-data',
    instrument: { symbol: 'DODic19', marketId: 'ROFX' },
    timestamp: 1,
    entries: { LAST: { price: 55.8 } },
    raw: '{}',
  };
  const orderReport: OrderReportMessage = {
    category: 'order-report',
    report: { clOrdId: 'user1', status: 'NEW' },
    raw: '{}',
  };
  const serverError: ErrorMessage = {
    category: 'error',
    code: 'SERVER_ERROR',
    description: 'Invalid product',
    raw: '{}',
  };

  beforeEach(() => {
    loggerMock = new LoggerMock();
    metrics = {
      incrementReceived: vi.fn(),
      incrementSent: vi.fn(),
      incrementError: vi.fn(),
      incrementReconnect: vi.fn(),
      getMetrics: vi.fn(async () => ''),
    };
    registry = new DispatchRegistry(loggerMock, metrics);
  });

  describe('dispatch()', () => {
    it('カテゴリに一致するハンドラだけに配信する', () => {
      const onMarketData = vi.fn();
      const onOrderReport = vi.fn();
      const onError = vi.fn();
      registry.register('market-data', onMarketData);
      registry.register('order-report', onOrderReport);
      registry.register('error', onError);

      registry.dispatch(marketData);
      registry.dispatch(orderReport);
      registry.dispatch(serverError);

      expect(onMarketData.mock.calls).toEqual([[marketData]]);
      expect(onOrderReport.mock.calls).toEqual([[orderReport]]);
      expect(onError.mock.calls).toEqual([[serverError]]);
    });

    it('登録順に配信し、重複登録は登録した回数だけ呼ばれる', () => {
      const calls: string[] = [];
      const first = () => {
        calls.push('first');
      };
      const second = () => {
        calls.push('second');
      };
      registry.register('market-data', first);
      registry.register('market-data', second);
      registry.register('market-data', first);

      registry.dispatch(marketData);

      expect(calls).toEqual(['first', 'second', 'first']);
    });

    it('ハンドラがなければ何もしない', () => {
      expect(() => registry.dispatch(marketData)).not.toThrow();
    });

    it('ハンドラが例外を投げても後続のハンドラに配信される', () => {
      const exceptions: RofexError[] = [];
      registry.setExceptionHandler((error) => exceptions.push(error));
      const boom = new Error('boom');
      const after = vi.fn();
      registry.register('market-data', () => {
        throw boom;
      });
      registry.register('market-data', after);

      registry.dispatch(marketData);

      expect(after).toHaveBeenCalledTimes(1);
      expect(exceptions).toHaveLength(1);
      expect(exceptions[0]).toBeInstanceOf(HandlerError);
      expect(exceptions[0]?.message).toBe('market-data handler failed: boom');
      expect(exceptions[0]?.cause).toBe(boom);
      expect(loggerMock.warn).toHaveBeenCalledWith('Handler failed', { category: 'market-data', err: boom });
      expect(metrics.incrementError).toHaveBeenCalledWith('handler_error');
    });

    it('非同期ハンドラの失敗も例外ハンドラへ通知される', async () => {
      const exceptionHandler = vi.fn();
      registry.setExceptionHandler(exceptionHandler);
      registry.register('order-report', async () => {
        throw new Error('async boom');
      });

      registry.dispatch(orderReport);
      await Promise.resolve();
      await Promise.resolve();

      expect(exceptionHandler).toHaveBeenCalledTimes(1);
      expect(exceptionHandler.mock.calls[0]?.[0]).toBeInstanceOf(HandlerError);
    });

    it('配信中の登録・削除は次のメッセージから反映される', () => {
      const late = vi.fn();
      const removed = vi.fn();
      registry.register('market-data', () => {
        registry.register('market-data', late);
        registry.remove('market-data', removed);
      });
      registry.register('market-data', removed);

      registry.dispatch(marketData);
      expect(late).not.toHaveBeenCalled();
      expect(removed).toHaveBeenCalledTimes(1);

      registry.dispatch(marketData);
      expect(late).toHaveBeenCalledTimes(1);
      expect(removed).toHaveBeenCalledTimes(1);
    });

    it('ガードが false になった時点で残りのハンドラへの配信を打ち切る', () => {
      let open = true;
      const first = vi.fn(() => {
        open = false;
      });
      const second = vi.fn();
      registry.register('market-data', first);
      registry.register('market-data', second);

      registry.dispatch(marketData, () => open);

      expect(first).toHaveBeenCalledTimes(1);
      expect(second).not.toHaveBeenCalled();
    });
  });

  describe('remove()', () => {
    it('最初に一致した登録だけを削除する', () => {
      const handler = vi.fn();
      registry.register('error', handler);
      registry.register('error', handler);

      expect(registry.remove('error', handler)).toBe(true);
      expect(registry.handlerCount('error')).toBe(1);

      registry.dispatch(serverError);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('登録されていなければ false', () => {
      expect(registry.remove('error', vi.fn())).toBe(false);
    });
  });

  describe('reportException()', () => {
    it('例外ハンドラ未設定ならエラーログに残す', () => {
      const error = new TransportError('lost');

      registry.reportException(error);

      expect(loggerMock.error).toHaveBeenCalledWith('Unhandled streaming exception', { err: error });
    });

    it('例外ハンドラ自体が失敗してもエラーログに残して続行する', () => {
      const thrown = new Error('handler broke');
      registry.setExceptionHandler(() => {
        throw thrown;
      });

      expect(() => registry.reportException(new TransportError('lost'))).not.toThrow();
      expect(loggerMock.error).toHaveBeenCalledWith('Exception handler threw', { err: thrown, original: 'lost' });
    });

    it('setExceptionHandler(null) で通知先を外せる', () => {
      const exceptionHandler = vi.fn();
      registry.setExceptionHandler(exceptionHandler);
      registry.setExceptionHandler(null);

      registry.reportException(new TransportError('lost'));

      expect(exceptionHandler).not.toHaveBeenCalled();
    });
  });
});
