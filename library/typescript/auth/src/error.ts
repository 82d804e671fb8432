export type AuthErrorCode = 'HTTP' | 'NETWORK' | 'TIMEOUT' | 'DECODE';

/**
 * 認証プロバイダー呼び出しのエラー。
 * HTTP エラーの場合は statusCode と プロバイダーのエラーコードを保持する。
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly code: AuthErrorCode,
    public readonly statusCode?: number,
    public readonly providerCode?: string,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'AuthError';
  }
}
