import type { RofexError } from '@/domain/errors';

/**
 * 受信メッセージのハンドラ。Promise を返した場合、その失敗も例外ハンドラへ回される。
 */
export type MessageHandler<T> = (message: T) => void | Promise<void>;

/**
 * 回復可能な障害・致命的な障害の通知先
 */
export type ExceptionHandler = (error: RofexError) => void;
