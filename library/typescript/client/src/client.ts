/**
 * 認証・テーブル・ストレージを 1 つの入口から扱うファサード。
 * セッションを保持し、アクセストークンの期限が近ければ各サブクライアントを渡す前に更新する。
 */

import {
  AuthClient,
  AuthError,
  MemorySessionStore,
  type LogoutScope,
  type Session,
  type SessionChangeListener,
  type SessionStore,
  type User,
} from '@supakit/auth';
import { ConfigError, loadFromEnv, validate, type ClientConfig } from '@supakit/config';
import { StorageClient } from '@supakit/storage-client';
import { componentLogger, createLogger, type Logger } from '@supakit/telemetry';
import { ClientError } from './error.js';
import { createPostgrestClient, type PostgrestFactory } from './postgrest.js';
import type { ClientOptions, RpcOptions } from './types.js';
import { UpdateUserBuilder } from './update-user.js';

/** 期限切れとみなすまでの猶予 (秒) */
const REFRESH_MARGIN_SECONDS = 60;

export class SupakitClient {
  readonly url: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn?: typeof globalThis.fetch;
  private readonly rootLogger: Logger;
  private readonly logger: Logger;
  private readonly store: SessionStore;
  private readonly auth: AuthClient;
  private readonly postgrestFactory: PostgrestFactory;
  private readonly now: () => number;
  private readonly listeners = new Set<SessionChangeListener>();
  private refreshing: Promise<Session> | null = null;
  /** セッションを置き換える・破棄するたびに進める世代番号 */
  private generation = 0;

  constructor(url: string, apiKey: string, options: ClientOptions = {}) {
    const config = withConfig(() =>
      validate({ url, apiKey, timeoutMs: options.timeoutMs, log: options.log ?? {} }),
    );

    this.url = config.url;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
    this.fetchFn = options.fetch;
    this.now = options.now ?? Date.now;
    this.rootLogger =
      options.logger ??
      createLogger({ name: 'supakit', level: config.log.level, format: config.log.format });
    this.logger = componentLogger('client', this.rootLogger);
    this.store = options.sessionStore ?? new MemorySessionStore(options.session);
    this.postgrestFactory = options.postgrest ?? createPostgrestClient;
    this.auth = new AuthClient({
      url: `${this.url}/auth/v1`,
      apiKey: this.apiKey,
      fetch: this.fetchFn,
      timeoutMs: this.timeoutMs,
      logger: this.rootLogger,
      now: this.now,
    });

    if (options.onSessionChange) {
      this.listeners.add(options.onSessionChange);
    }
  }

  /** SUPAKIT_URL / SUPAKIT_API_KEY などの環境変数からクライアントを生成する。 */
  static fromEnv(
    options: Omit<ClientOptions, 'timeoutMs' | 'log'> = {},
    env: NodeJS.ProcessEnv = process.env,
  ): SupakitClient {
    const config: ClientConfig = withConfig(() => loadFromEnv(env));
    return new SupakitClient(config.url, config.apiKey, {
      ...options,
      timeoutMs: config.timeoutMs,
      log: config.log,
    });
  }

  /** セッション変更を購読する。戻り値の関数で購読を解除する。 */
  onSessionChange(listener: SessionChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getSession(): Session | null {
    return this.store.getSession();
  }

  hasValidAuthState(): boolean {
    return this.store.getSession() !== null;
  }

  user(): User | null {
    return this.store.getSession()?.user ?? null;
  }

  /** パスワードでログインし、セッションを置き換える。失敗時は既存のセッションを変更しない。 */
  async login(email: string, password: string): Promise<Session> {
    const session = await this.auth.login(email, password);
    this.setAuthState(session);
    return session;
  }

  async logout(scope?: LogoutScope): Promise<void> {
    const session = await this.ensureFreshSession();
    await this.auth.logout(session.accessToken, scope);
    this.clearAuthState();
  }

  async getUser(): Promise<User> {
    const session = await this.ensureFreshSession();
    return this.auth.getUser(session.accessToken);
  }

  async updateUser(): Promise<UpdateUserBuilder> {
    await this.ensureFreshSession();
    return new UpdateUserBuilder(async (payload) => {
      const session = this.store.getSession();
      if (!session) {
        throw missingAuth();
      }
      return this.auth.updateUser(session.accessToken, payload);
    });
  }

  /** テーブルへのクエリビルダーを返す。 */
  async from(table: string) {
    const session = await this.ensureFreshSession();
    return this.postgrest(session).from(table);
  }

  /**
   * ストアドプロシージャを呼び出し、レスポンスを返す。
   * 結果にフィルタを連結する場合は rest() で得たクライアントの rpc() を使う。
   */
  async rpc(fn: string, args: Record<string, unknown> = {}, options: RpcOptions = {}) {
    const session = await this.ensureFreshSession();
    return this.postgrest(session).rpc(fn, args, options);
  }

  /** 認証ヘッダー付きの Postgrest クライアントを返す。 */
  async rest() {
    const session = await this.ensureFreshSession();
    return this.postgrest(session);
  }

  /** ストレージクライアントを返す。セッションがなければ匿名アクセスになる。 */
  async storage(): Promise<StorageClient> {
    const session = this.store.getSession() ? await this.ensureFreshSession() : null;
    return new StorageClient({
      url: `${this.url}/storage/v1`,
      apiKey: this.apiKey,
      accessToken: session?.accessToken,
      fetch: this.fetchFn,
      timeoutMs: this.timeoutMs,
      logger: this.rootLogger,
    });
  }

  /**
   * 有効期限まで REFRESH_MARGIN_SECONDS を切ったセッションを更新して返す。
   * 同時に呼ばれた場合は 1 つの更新リクエストを共有する。
   */
  async ensureFreshSession(): Promise<Session> {
    const session = this.store.getSession();
    if (!session) {
      throw missingAuth();
    }
    if (session.expiresAt >= Math.floor(this.now() / 1000) + REFRESH_MARGIN_SECONDS) {
      return session;
    }
    if (!this.refreshing) {
      this.refreshing = this.refresh(session, this.generation).finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async refresh(session: Session, generation: number): Promise<Session> {
    this.logger.debug({ expires_at: session.expiresAt }, 'Refreshing session');
    try {
      const next = await this.auth.refreshSession(session.refreshToken);
      // 更新中にログイン・ログアウトされた場合はそちらを優先する
      if (this.generation === generation) {
        this.setAuthState(next);
      }
      return next;
    } catch (e) {
      if (!(e instanceof AuthError)) throw e;
      if (e.statusCode === 400 && this.generation === generation) {
        this.clearAuthState();
      }
      throw new ClientError(`Failed to refresh session: ${e.message}`, 'SESSION_REFRESH', e);
    }
  }

  private postgrest(session: Session) {
    return this.postgrestFactory(`${this.url}/rest/v1`, {
      headers: { apikey: this.apiKey, Authorization: `Bearer ${session.accessToken}` },
      fetch: this.fetchFn,
    });
  }

  private setAuthState(session: Session): void {
    this.generation += 1;
    this.store.setSession(session);
    this.notify(session);
  }

  private clearAuthState(): void {
    this.generation += 1;
    this.store.clearSession();
    this.notify(null);
  }

  private notify(session: Session | null): void {
    for (const listener of [...this.listeners]) {
      try {
        const result = listener(session);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            this.logger.warn({ err }, 'Session listener rejected');
          });
        }
      } catch (err) {
        this.logger.warn({ err }, 'Session listener threw');
      }
    }
  }
}

/** new SupakitClient(url, apiKey, options) の短縮形 */
export function createClient(url: string, apiKey: string, options?: ClientOptions): SupakitClient {
  return new SupakitClient(url, apiKey, options);
}

function withConfig(load: () => ClientConfig): ClientConfig {
  try {
    return load();
  } catch (e) {
    if (e instanceof ConfigError) {
      throw new ClientError(e.message, 'INVALID_CONFIG', e);
    }
    throw e;
  }
}

function missingAuth(): ClientError {
  return new ClientError('Missing authentication information', 'MISSING_AUTH');
}
