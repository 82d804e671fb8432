import type { Logger } from '@supakit/telemetry';

export interface BucketInformation {
  id: string;
  name: string;
  owner: string | null;
  public: boolean | null;
  fileSizeLimit: number | null;
  allowedMimeTypes: string[] | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

/** ストレージ上のオブジェクト。フォルダのプレースホルダーは id が null になる。 */
export interface StorageObject {
  name: string;
  id: string | null;
  bucketId: string | null;
  owner: string | null;
  ownerId: string | null;
  version: string | null;
  metadata: Record<string, unknown> | null;
  userMetadata: Record<string, unknown> | null;
  createdAt: Date | null;
  updatedAt: Date | null;
  lastAccessedAt: Date | null;
  bucket?: BucketInformation;
}

/** upload / update の結果。key は "bucket/path" 形式。 */
export interface ObjectIdentifier {
  id: string;
  key: string;
}

export type UploadData = Uint8Array | Blob | string;

export interface UploadOptions {
  /** 未指定の場合は Blob の type、なければ application/octet-stream */
  contentType?: string;
  /** cache-control: max-age の秒数 */
  cacheControl?: number;
  /** 既存オブジェクトを上書きする */
  upsert?: boolean;
}

export interface StorageClientOptions {
  /** ストレージ API のベース URL（例: https://xyz.example.com/storage/v1） */
  url: string;
  apiKey: string;
  /** 未指定の場合は API キーのみで匿名アクセスする */
  accessToken?: string;
  /** fetch 関数の注入（テスト用） */
  fetch?: typeof globalThis.fetch;
  /** リクエストタイムアウト (ms)。デフォルト 30_000。 */
  timeoutMs?: number;
  logger?: Logger;
}
