import { z } from 'zod';
import { ValidationError } from '@/domain/errors';
import { Environment } from '@/domain/types';
import { formatZodIssues } from '@/infra/codec/schemas';

/**
 * インフラ層: 接続先環境の設定
 */
export interface EnvironmentConfig {
  /** REST API のベース URL（末尾スラッシュ付き） */
  restUrl: string;
  /** WebSocket の URL */
  wsUrl: string;
  /** 注文の照会・取消に使う proprietary の既定値 */
  proprietary: string;
}

export const ENVIRONMENTS: Readonly<Record<Environment, EnvironmentConfig>> = {
  [Environment.REMARKET]: {
    restUrl: 'https://api.remarkets.primary.com.ar/',
    wsUrl: 'wss://api.remarkets.primary.com.ar/',
    proprietary: 'PBCP',
  },
  [Environment.LIVE]: {
    restUrl: 'https://api.primary.com.ar/',
    wsUrl: 'wss://api.primary.com.ar/',
    proprietary: 'api',
  },
};

const EnvironmentOverridesSchema = z.object({
  restUrl: z
    .string()
    .url()
    .transform((url) => (url.endsWith('/') ? url : `${url}/`))
    .optional(),
  wsUrl: z.string().url().optional(),
  proprietary: z.string().min(1).optional(),
});

export const EnvironmentSchema = z.nativeEnum(Environment);

/**
 * 既定値に上書きを適用した設定を返す。
 * @throws {ValidationError} 上書き値が URL として不正な場合
 */
export function resolveEnvironmentConfig(
  environment: Environment,
  overrides: Partial<EnvironmentConfig> = {}
): EnvironmentConfig {
  const parsed = EnvironmentOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ValidationError(`invalid ${environment} configuration: ${issues.join('; ')}`, issues);
  }
  const base = ENVIRONMENTS[environment];
  return {
    restUrl: parsed.data.restUrl ?? base.restUrl,
    wsUrl: parsed.data.wsUrl ?? base.wsUrl,
    proprietary: parsed.data.proprietary ?? base.proprietary,
  };
}

/**
 * 環境変数 `ROFEX_<ENV>_REST_URL` / `ROFEX_<ENV>_WS_URL` / `ROFEX_<ENV>_PROPRIETARY` から上書き値を読む。
 * 空文字は未設定として扱う。
 */
export function loadEnvironmentOverrides(
  environment: Environment,
  env: NodeJS.ProcessEnv = process.env
): Partial<EnvironmentConfig> {
  const prefix = `ROFEX_${environment}_`;
  const overrides: Partial<EnvironmentConfig> = {};
  const restUrl = env[`${prefix}REST_URL`];
  const wsUrl = env[`${prefix}WS_URL`];
  const proprietary = env[`${prefix}PROPRIETARY`];
  if (restUrl) {
    overrides.restUrl = restUrl;
  }
  if (wsUrl) {
    overrides.wsUrl = wsUrl;
  }
  if (proprietary) {
    overrides.proprietary = proprietary;
  }
  return overrides;
}

/**
 * 文字列を Environment として解釈する（大文字小文字は区別しない）。
 * @throws {ValidationError} 未知の環境名の場合
 */
export function parseEnvironment(value: string): Environment {
  const parsed = EnvironmentSchema.safeParse(value.trim().toUpperCase());
  if (!parsed.success) {
    throw new ValidationError(`unknown environment: ${value}`, formatZodIssues(parsed.error));
  }
  return parsed.data;
}
