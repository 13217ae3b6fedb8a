import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

export interface PinoLoggerOptions {
  level?: string;
  pretty?: boolean;
  name?: string;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` で人間可読形式、本番環境では JSON 形式で出力。
 * 子ロガーも同じクラスで包む。
 */
export class PinoLogger implements Logger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  /**
   * 設定からルートロガーを生成する。
   */
  static create(options: PinoLoggerOptions = {}): PinoLogger {
    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';

    if (usePretty) {
      return new PinoLogger(
        pino({
          name: options.name,
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          },
        })
      );
    }

    return new PinoLogger(pino({ name: options.name, level }));
  }

  debug(msg: string, meta?: object): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: object): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: object): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, meta?: object): void {
    this.pinoLogger.error(meta ?? {}, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}
