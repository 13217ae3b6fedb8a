import type { MessageCategory } from '@/domain/models/InboundMessage';

/**
 * ドメイン層: ライブラリが送出するエラー
 *
 * すべて RofexError を継承する。原因は ES2022 の `cause` に保持する。
 */
export class RofexError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 資格情報またはトークンが拒否された。
 */
export class AuthenticationError extends RofexError {}

/**
 * トークンを再取得しても拒否された。
 */
export class TokenExpiredError extends AuthenticationError {}

/**
 * 送信前の検証に失敗した。バイトは送られていない。
 */
export class ValidationError extends RofexError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.issues = issues;
  }
}

/**
 * 接続の確立・維持に失敗した。terminal はセッションが再接続を諦めたことを示す。
 */
export class TransportError extends RofexError {
  readonly terminal: boolean;

  constructor(message: string, options?: ErrorOptions & { terminal?: boolean }) {
    super(message, options);
    this.terminal = options?.terminal ?? false;
  }
}

/**
 * 受信フレームを解釈できなかった。
 */
export class ProtocolError extends RofexError {
  constructor(
    message: string,
    readonly raw: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * 登録されたハンドラが例外を投げた。
 */
export class HandlerError extends RofexError {
  constructor(
    readonly category: MessageCategory,
    cause: unknown
  ) {
    super(`${category} handler failed: ${describeCause(cause)}`, { cause });
  }
}

/**
 * REST API が失敗を返した。
 */
export class ApiError extends RofexError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
