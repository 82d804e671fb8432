import type { Session, SessionStore } from './types.js';

/**
 * メモリベースのセッションストア。
 * 永続化は行わず、クライアントインスタンスの生存期間だけ保持する。
 */
export class MemorySessionStore implements SessionStore {
  private session: Session | null;

  constructor(initial?: Session | null) {
    this.session = initial ?? null;
  }

  getSession(): Session | null {
    return this.session;
  }

  setSession(session: Session): void {
    this.session = session;
  }

  clearSession(): void {
    this.session = null;
  }
}
