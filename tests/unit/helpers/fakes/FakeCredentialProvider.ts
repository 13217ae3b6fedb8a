import { type Mock, vi } from 'vitest';
import type { CredentialProvider } from '@/application/interfaces/CredentialProvider';
import type { Token } from '@/domain/models/Token';

export function testToken(value = 'test-token'): Token {
  return { value, issuedAt: 0, expiresAt: Number.MAX_SAFE_INTEGER };
}

/**
 * テスト用資格情報プロバイダ（既定では常に test-token を返す）
 */
export class FakeCredentialProvider implements CredentialProvider {
  getToken: Mock<() => Promise<Token>> = vi.fn<() => Promise<Token>>(async () => testToken());
  refresh: Mock<() => Promise<Token>> = vi.fn<() => Promise<Token>>(async () => testToken('test-token-refreshed'));
  invalidate: Mock<() => void> = vi.fn<() => void>();
}
