import { ClientConfigSchema, type ClientConfig } from './config.js';
import { ConfigError } from './error.js';

export const ENV_URL = 'SUPAKIT_URL';
export const ENV_API_KEY = 'SUPAKIT_API_KEY';
export const ENV_TIMEOUT_MS = 'SUPAKIT_TIMEOUT_MS';
export const ENV_LOG_LEVEL = 'SUPAKIT_LOG_LEVEL';
export const ENV_LOG_FORMAT = 'SUPAKIT_LOG_FORMAT';

/**
 * 設定値のバリデーション。Zod スキーマでパースし、デフォルト値を補完した設定を返す。
 * 不正値は ConfigError を投げる。
 */
export function validate(input: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`invalid client config: ${issues.join(', ')}`, issues, result.error);
  }
  return result.data;
}

/**
 * 環境変数から設定を読み込む。未設定の項目はスキーマのデフォルト値を使う。
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const log: Record<string, string> = {};
  const level = env[ENV_LOG_LEVEL];
  const format = env[ENV_LOG_FORMAT];
  if (level) log['level'] = level;
  if (format) log['format'] = format;

  const timeout = env[ENV_TIMEOUT_MS];

  return validate({
    url: env[ENV_URL],
    apiKey: env[ENV_API_KEY],
    timeoutMs: timeout ? Number(timeout) : undefined,
    log,
  });
}
