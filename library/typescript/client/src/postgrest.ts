import { PostgrestClient } from '@supabase/postgrest-js';

export interface PostgrestFactoryOptions {
  headers: Record<string, string>;
  fetch?: typeof globalThis.fetch;
}

/** 認証ヘッダー付きのクエリビルダーを生成する。テストや独自実装への差し替え用。 */
export type PostgrestFactory = (url: string, options: PostgrestFactoryOptions) => PostgrestClient;

export const createPostgrestClient: PostgrestFactory = (url, options) =>
  new PostgrestClient(url, { headers: options.headers, fetch: options.fetch });
