import type { Logger } from '@supakit/telemetry';

export interface User {
  id: string;
  aud?: string;
  role?: string;
  email?: string;
  phone?: string;
  createdAt?: string;
  updatedAt?: string;
  appMetadata: Record<string, unknown>;
  userMetadata: Record<string, unknown>;
}

/** 認証済みユーザーを表すトークンの組。expiresAt は UNIX 秒。 */
export interface Session {
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiresIn?: number;
  expiresAt: number;
  user: User | null;
}

export type LogoutScope = 'global' | 'local' | 'others';

export interface UpdateUserPayload {
  email?: string;
  password?: string;
  data?: Record<string, unknown>;
}

/** セッション保存ストア。 */
export interface SessionStore {
  getSession(): Session | null;
  setSession(session: Session): void;
  clearSession(): void;
}

/** セッション変更の通知先。ログアウト時は null を受け取る。 */
export type SessionChangeListener = (session: Session | null) => void | Promise<void>;

export interface AuthClientOptions {
  /** 認証エンドポイントのベース URL（例: https://xyz.example.com/auth/v1） */
  url: string;
  apiKey: string;
  /** fetch 関数の注入（テスト用） */
  fetch?: typeof globalThis.fetch;
  /** リクエストタイムアウト (ms)。デフォルト 30_000。 */
  timeoutMs?: number;
  logger?: Logger;
  /** 現在時刻 (ms) の注入（テスト用） */
  now?: () => number;
}
