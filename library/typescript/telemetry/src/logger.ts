import pino from 'pino';
import { trace } from '@opentelemetry/api';

export type Logger = pino.Logger;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type LogFormat = 'json' | 'text';

/**
 * LoggerConfig はクライアントライブラリのロガー設定を定義する。
 */
export interface LoggerConfig {
  name: string;
  version?: string;
  level: LogLevel;
  format?: LogFormat;
}

/** ログに出さない認証情報のパス */
export const REDACTED_PATHS = [
  'apikey',
  'password',
  'accessToken',
  'refreshToken',
  'headers.apikey',
  'headers.Authorization',
];

const prettyTransport: pino.TransportSingleOptions = {
  target: 'pino-pretty',
  options: { colorize: true, translateTime: 'SYS:standard' },
};

/** アクティブなスパンがあれば trace_id / span_id を返す。 */
export function traceFields(): Record<string, string> {
  const context = trace.getActiveSpan()?.spanContext();
  return context ? { trace_id: context.traceId, span_id: context.spanId } : {};
}

/**
 * pino ロガーを生成する。base に service / version、mixin でトレース ID を付け、
 * API キーやトークンは伏せ字にする。format が text なら pino-pretty で出力する。
 */
export function createLogger(cfg: LoggerConfig): Logger {
  return pino({
    level: cfg.level,
    base: { service: cfg.name, version: cfg.version },
    mixin: traceFields,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    ...(cfg.format === 'text' ? { transport: prettyTransport } : {}),
  });
}

/**
 * componentLogger はサブクライアント用の子ロガーを返す。
 * logger が未指定の場合は何も出力しないロガーを生成する。
 */
export function componentLogger(component: string, logger?: Logger): Logger {
  const base = logger ?? createLogger({ name: 'supakit', level: 'silent' });
  return base.child({ component });
}
