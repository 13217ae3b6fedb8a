import { calledHeaders, calledUrl, fakeFetch, tokenResponse } from '@test/unit/helpers/fakes/fakeFetch';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it } from 'vitest';
import { AuthenticationError, TransportError } from '@/domain/errors';
import { RestCredentialProvider } from '@/infra/auth/RestCredentialProvider';

const BASE_URL = 'https://api.example.test/';

/**
 * 単体テスト: RestCredentialProvider
 *
 * - トークンの取得とキャッシュ
 * - 期限切れ時の再取得と同時要求のまとめ
 * - 認証失敗のエラー変換
 */
describe('RestCredentialProvider', () => {
  let clock: number;
  let loggerMock: LoggerMock;

  beforeEach(() => {
    clock = 1000;
    loggerMock = new LoggerMock();
  });

  function createProvider(fetchFn: typeof fetch): RestCredentialProvider {
    return new RestCredentialProvider({
      baseUrl: BASE_URL,
      user: 'test-user',
      password: 'test-secret',
      tokenTtlMs: 5000,
      fetchFn,
      now: () => clock,
      logger: loggerMock,
    });
  }

  describe('getToken()', () => {
    it('認証エンドポイントへ資格情報を POST し、応答ヘッダのトークンを返す', async () => {
      const fetchMock = fakeFetch(tokenResponse('test-token'));
      const provider = createProvider(fetchMock);

      const token = await provider.getToken();

      expect(token).toEqual({ value: 'test-token', issuedAt: 1000, expiresAt: 6000 });
      expect(calledUrl(fetchMock, 0)).toBe('https://api.example.test/auth/getToken');
      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
      expect(calledHeaders(fetchMock, 0).get('X-Username')).toBe('test-user');
      expect(calledHeaders(fetchMock, 0).get('X-Password')).toBe('test-secret');
    });

    it('期限内ならキャッシュを返す', async () => {
      const fetchMock = fakeFetch(tokenResponse('test-token'));
      const provider = createProvider(fetchMock);

      await provider.getToken();
      clock = 5999;
      const token = await provider.getToken();

      expect(token.value).toBe('test-token');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('期限切れなら取得し直す', async () => {
      const fetchMock = fakeFetch(tokenResponse('test-token'), tokenResponse('test-token-2'));
      const provider = createProvider(fetchMock);

      await provider.getToken();
      clock = 6000;
      const token = await provider.getToken();

      expect(token).toEqual({ value: 'test-token-2', issuedAt: 6000, expiresAt: 11000 });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('同時の取得要求は 1 回の認証にまとめる', async () => {
      const fetchMock = fakeFetch(tokenResponse('test-token'));
      const provider = createProvider(fetchMock);

      const [first, second] = await Promise.all([provider.getToken(), provider.getToken()]);

      expect(first).toBe(second);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('資格情報が拒否されたら AuthenticationError', async () => {
      const provider = createProvider(fakeFetch(new Response('Unauthorized', { status: 401 })));

      await expect(provider.getToken()).rejects.toThrow(AuthenticationError);
      expect(loggerMock.warn).toHaveBeenCalledWith('Authentication rejected', { status: 401 });
    });

    it('応答にトークンがなければ AuthenticationError', async () => {
      const provider = createProvider(fakeFetch(new Response(null, { status: 200 })));

      await expect(provider.getToken()).rejects.toThrow('authentication response did not include a token');
    });

    it('通信に失敗したら TransportError で、次の要求では再試行する', async () => {
      const fetchMock = fakeFetch(new Error('getaddrinfo ENOTFOUND'), tokenResponse('test-token'));
      const provider = createProvider(fetchMock);

      await expect(provider.getToken()).rejects.toThrow(TransportError);
      await expect(provider.getToken()).resolves.toMatchObject({ value: 'test-token' });
    });
  });

  describe('refresh()', () => {
    it('キャッシュがあっても取得し直す', async () => {
      const fetchMock = fakeFetch(tokenResponse('test-token'), tokenResponse('test-token-2'));
      const provider = createProvider(fetchMock);

      await provider.getToken();
      const token = await provider.refresh();

      expect(token.value).toBe('test-token-2');
      expect(provider.currentToken()?.value).toBe('test-token-2');
    });
  });

  describe('invalidate()', () => {
    it('キャッシュを破棄し、次の getToken() で取得し直す', async () => {
      const fetchMock = fakeFetch(tokenResponse('test-token'), tokenResponse('test-token-2'));
      const provider = createProvider(fetchMock);

      await provider.getToken();
      provider.invalidate();

      expect(provider.currentToken()).toBeNull();
      expect((await provider.getToken()).value).toBe('test-token-2');
    });
  });
});
