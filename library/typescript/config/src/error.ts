/** 設定値が不正な場合のエラー。issues は "path: message" 形式。 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'ConfigError';
  }
}
