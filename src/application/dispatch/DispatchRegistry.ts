import type { Logger } from '@/application/interfaces/Logger';
import type { ExceptionHandler, MessageHandler } from '@/application/interfaces/MessageHandler';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { HandlerError, type RofexError } from '@/domain/errors';
import type { InboundMessage, InboundMessageMap, MessageCategory } from '@/domain/models/InboundMessage';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

type HandlerTable = { [C in MessageCategory]: Array<MessageHandler<InboundMessageMap[C]>> };

/**
 * アプリケーション層: カテゴリ別ハンドラの登録と配信
 *
 * 責務:
 * - カテゴリごとに登録順のハンドラ列を保持する（重複登録はそのまま保持）
 * - 例外ハンドラのスロットを 1 つ保持する
 * - ハンドラの失敗を隔離し、HandlerError として例外ハンドラへ通知する
 *
 * 配信は登録リストのスナップショットに対して行うため、配信中の登録・削除は次のメッセージから反映される。
 */
export class DispatchRegistry {
  private readonly handlers: HandlerTable = {
    'market-data': [],
    'order-report': [],
    error: [],
  };
  private exceptionHandler: ExceptionHandler | null = null;
  private readonly logger: Logger;

  /**
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'DispatchRegistry' });
  }

  register<C extends MessageCategory>(category: C, handler: MessageHandler<InboundMessageMap[C]>): void {
    this.handlers[category].push(handler);
  }

  /**
   * 最初に一致した登録を 1 つ削除する。
   * @returns 削除できた場合 true
   */
  remove<C extends MessageCategory>(category: C, handler: MessageHandler<InboundMessageMap[C]>): boolean {
    const list = this.handlers[category];
    const index = list.indexOf(handler);
    if (index === -1) {
      return false;
    }
    list.splice(index, 1);
    return true;
  }

  handlerCount(category: MessageCategory): number {
    return this.handlers[category].length;
  }

  setExceptionHandler(handler: ExceptionHandler | null): void {
    this.exceptionHandler = handler;
  }

  /**
   * メッセージをそのカテゴリのハンドラへ登録順に配信する。
   * @param guard false を返した時点で残りのハンドラへの配信を打ち切る
   */
  dispatch(message: InboundMessage, guard?: () => boolean): void {
    switch (message.category) {
      case 'market-data':
        this.invokeAll(message.category, this.handlers['market-data'], message, guard);
        break;
      case 'order-report':
        this.invokeAll(message.category, this.handlers['order-report'], message, guard);
        break;
      case 'error':
        this.invokeAll(message.category, this.handlers.error, message, guard);
        break;
    }
  }

  /**
   * 障害を例外ハンドラへ通知する。未設定時や例外ハンドラ自体が失敗した場合はエラーログに残す。
   */
  reportException(error: RofexError): void {
    if (!this.exceptionHandler) {
      this.logger.error('Unhandled streaming exception', { err: error });
      return;
    }
    try {
      this.exceptionHandler(error);
    } catch (handlerError) {
      this.logger.error('Exception handler threw', { err: handlerError, original: error.message });
    }
  }

  private invokeAll<T>(
    category: MessageCategory,
    handlers: ReadonlyArray<MessageHandler<T>>,
    message: T,
    guard?: () => boolean
  ): void {
    for (const handler of [...handlers]) {
      if (guard && !guard()) {
        return;
      }
      try {
        const result = handler(message);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerFailure(category, error));
        }
      } catch (error) {
        this.reportHandlerFailure(category, error);
      }
    }
  }

  private reportHandlerFailure(category: MessageCategory, cause: unknown): void {
    const error = new HandlerError(category, cause);
    this.logger.warn('Handler failed', { category, err: cause });
    this.metricsCollector?.incrementError('handler_error');
    this.reportException(error);
  }
}
