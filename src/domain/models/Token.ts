/**
 * ドメイン層: 認証トークン
 *
 * 時刻はすべて epoch ミリ秒。
 */
export interface Token {
  value: string;
  issuedAt: number;
  expiresAt: number;
}

/**
 * トークンが期限切れかどうかを判定する。
 * @param now 判定時刻（省略時は現在時刻）
 */
export function isTokenExpired(token: Token, now: number = Date.now()): boolean {
  return now >= token.expiresAt;
}
