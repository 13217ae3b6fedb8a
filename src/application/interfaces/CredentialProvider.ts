import type { Token } from '@/domain/models/Token';

/**
 * 資格情報プロバイダ
 *
 * 責務: アクセストークンの取得・キャッシュ・更新。
 */
export interface CredentialProvider {
  /**
   * 有効なトークンを返す。キャッシュが切れていれば取得し直す。
   * @throws {AuthenticationError} 資格情報が拒否された場合
   * @throws {TransportError} 認証エンドポイントに到達できない場合
   */
  getToken(): Promise<Token>;

  /**
   * キャッシュを無視してトークンを取得し直す。
   */
  refresh(): Promise<Token>;

  /**
   * キャッシュ済みトークンを破棄する（拒否された後に呼ぶ）。
   */
  invalidate(): void;
}
