export type ClientErrorCode = 'INVALID_CONFIG' | 'MISSING_AUTH' | 'SESSION_REFRESH';

/** ファサードのエラー。下位のエラーは cause に保持する。 */
export class ClientError extends Error {
  constructor(
    message: string,
    public readonly code: ClientErrorCode,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'ClientError';
  }
}
