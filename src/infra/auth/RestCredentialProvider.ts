import type { CredentialProvider } from '@/application/interfaces/CredentialProvider';
import type { Logger } from '@/application/interfaces/Logger';
import { AuthenticationError, TransportError } from '@/domain/errors';
import { isTokenExpired, type Token } from '@/domain/models/Token';
import { DEFAULT_TOKEN_TTL_MS } from '@/infra/config/streaming';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

export interface RestCredentialProviderOptions {
  /** REST API のベース URL（末尾スラッシュ付き） */
  baseUrl: string;
  user: string;
  password: string;
  tokenTtlMs?: number;
  fetchFn?: typeof fetch;
  now?: () => number;
  logger?: Logger;
}

/**
 * インフラ層: REST の認証エンドポイントからトークンを取得する資格情報プロバイダ
 *
 * `POST auth/getToken` に X-Username / X-Password を付けて送り、応答ヘッダ X-Auth-Token を受け取る。
 * 同時に複数の取得要求があっても認証リクエストは 1 本にまとめる。
 */
export class RestCredentialProvider implements CredentialProvider {
  private token: Token | null = null;
  private pending: Promise<Token> | null = null;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => number;
  private readonly tokenTtlMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: RestCredentialProviderOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.tokenTtlMs = options.tokenTtlMs ?? DEFAULT_TOKEN_TTL_MS;
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'RestCredentialProvider' });
  }

  async getToken(): Promise<Token> {
    if (this.token && !isTokenExpired(this.token, this.now())) {
      return this.token;
    }
    return await this.refresh();
  }

  refresh(): Promise<Token> {
    if (!this.pending) {
      this.pending = this.authenticate().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.token = null;
  }

  /**
   * キャッシュ済みのトークン（未取得なら null）
   */
  currentToken(): Token | null {
    return this.token;
  }

  private async authenticate(): Promise<Token> {
    const url = `${this.options.baseUrl}auth/getToken`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'X-Username': this.options.user,
          'X-Password': this.options.password,
        },
      });
    } catch (error) {
      throw new TransportError(`authentication request failed: ${url}`, { cause: error });
    }

    if (!response.ok) {
      this.logger.warn('Authentication rejected', { status: response.status });
      throw new AuthenticationError('Authentication fails. Incorrect User or Password');
    }

    const value = response.headers.get('X-Auth-Token');
    if (!value) {
      throw new AuthenticationError('authentication response did not include a token');
    }

    const issuedAt = this.now();
    const token: Token = { value, issuedAt, expiresAt: issuedAt + this.tokenTtlMs };
    this.token = token;
    this.logger.info('Access token acquired', { expiresAt: new Date(token.expiresAt).toISOString() });
    return token;
  }
}
