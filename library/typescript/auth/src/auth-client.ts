/**
 * 認証プロバイダー (GoTrue 互換) の REST クライアント。
 * セッションは保持せず、呼び出し元がトークンを渡す。
 */

import type { z } from 'zod';
import { componentLogger, type Logger } from '@supakit/telemetry';
import { AuthError } from './error.js';
import { ErrorBodySchema, SessionResponseSchema, UserSchema, toSession } from './schema.js';
import type {
  AuthClientOptions,
  LogoutScope,
  Session,
  UpdateUserPayload,
  User,
} from './types.js';

interface RequestOptions {
  body?: unknown;
  accessToken?: string;
}

export class AuthClient {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: AuthClientOptions) {
    this.url = options.url.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = componentLogger('auth', options.logger);
    this.now = options.now ?? Date.now;
  }

  /** メールアドレスとパスワードでログインする。POST /token?grant_type=password */
  async login(email: string, password: string): Promise<Session> {
    const text = await this.send('POST', '/token?grant_type=password', {
      body: { email, password },
    });
    return toSession(decode(text, SessionResponseSchema, 'token'), this.now());
  }

  /** refresh_token で新しいセッションを取得する。POST /token?grant_type=refresh_token */
  async refreshSession(refreshToken: string): Promise<Session> {
    const text = await this.send('POST', '/token?grant_type=refresh_token', {
      body: { refresh_token: refreshToken },
    });
    return toSession(decode(text, SessionResponseSchema, 'token'), this.now());
  }

  /**
   * アクセストークンを失効させる。POST /logout
   * scope 未指定の場合はプロバイダーのデフォルト (global) に従う。
   */
  async logout(accessToken: string, scope?: LogoutScope): Promise<void> {
    const query = scope ? `?scope=${scope}` : '';
    await this.send('POST', `/logout${query}`, { accessToken });
  }

  /** トークンに対応するユーザーを取得する。GET /user */
  async getUser(accessToken: string): Promise<User> {
    const text = await this.send('GET', '/user', { accessToken });
    return decode(text, UserSchema, 'user');
  }

  /** ユーザー情報を更新する。PUT /user */
  async updateUser(accessToken: string, payload: UpdateUserPayload): Promise<User> {
    const text = await this.send('PUT', '/user', { accessToken, body: payload });
    return decode(text, UserSchema, 'user');
  }

  private async send(method: string, path: string, options: RequestOptions): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const started = this.now();

    const headers: Record<string, string> = { apikey: this.apiKey };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (options.accessToken) {
      headers['Authorization'] = `Bearer ${options.accessToken}`;
    }

    try {
      const resp = await this.fetchFn(`${this.url}${path}`, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      const text = await resp.text();
      this.logger.debug(
        { method, path, status: resp.status, duration_ms: this.now() - started },
        'Auth request completed',
      );
      if (!resp.ok) {
        throw httpError(resp.status, text);
      }
      return text;
    } catch (e) {
      if (e instanceof AuthError) throw e;
      const cause = e instanceof Error ? e : undefined;
      if (controller.signal.aborted) {
        throw new AuthError(`Auth request timed out after ${this.timeoutMs}ms`, 'TIMEOUT', undefined, undefined, cause);
      }
      throw new AuthError(`Auth request failed: ${String(e)}`, 'NETWORK', undefined, undefined, cause);
    } finally {
      clearTimeout(timer);
    }
  }
}

function httpError(status: number, text: string): AuthError {
  let body: z.infer<typeof ErrorBodySchema> = {};
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) body = parsed.data;
  } catch {
    // JSON でないボディはそのままメッセージに使う
    body = { message: text || undefined };
  }
  const message = body.error_description ?? body.msg ?? body.message ?? body.error ?? `HTTP ${status}`;
  return new AuthError(message, 'HTTP', status, body.error_code ?? body.error);
}

function decode<S extends z.ZodTypeAny>(text: string, schema: S, what: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new AuthError(
      `Malformed JSON in ${what} response`,
      'DECODE',
      undefined,
      undefined,
      e instanceof Error ? e : undefined,
    );
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new AuthError(
      `Unexpected ${what} response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
      'DECODE',
      undefined,
      undefined,
      result.error,
    );
  }
  return result.data;
}
