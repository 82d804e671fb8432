import type { Session, SessionChangeListener, SessionStore } from '@supakit/auth';
import type { Logger, LogFormat, LogLevel } from '@supakit/telemetry';
import type { PostgrestFactory } from './postgrest.js';

export interface ClientOptions {
  /** 復元済みのセッション。sessionStore を渡した場合は無視する。 */
  session?: Session | null;
  sessionStore?: SessionStore;
  onSessionChange?: SessionChangeListener;
  /** リクエストタイムアウト (ms)。デフォルト 30_000。 */
  timeoutMs?: number;
  log?: { level?: LogLevel; format?: LogFormat };
  /** 指定した場合は log を無視してこのロガーを使う */
  logger?: Logger;
  /** fetch 関数の注入（テスト用） */
  fetch?: typeof globalThis.fetch;
  postgrest?: PostgrestFactory;
  /** 現在時刻 (ms) の注入（テスト用） */
  now?: () => number;
}

export interface RpcOptions {
  head?: boolean;
  count?: 'exact' | 'planned' | 'estimated';
}
