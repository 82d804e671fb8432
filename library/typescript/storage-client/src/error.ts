export type StorageErrorCode =
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'HTTP'
  | 'NETWORK'
  | 'TIMEOUT'
  | 'DECODE'
  | 'INVALID_REQUEST';

/** ストレージ API 呼び出しのエラー。statusCode は HTTP ステータス。 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly code: StorageErrorCode,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}
