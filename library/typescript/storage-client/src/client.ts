/**
 * ストレージ REST API クライアント。
 * 1 操作につき 1 回の HTTP リクエストを送り、リトライは行わない。
 */

import type { z } from 'zod';
import { componentLogger, type Logger } from '@supakit/telemetry';
import { StorageError } from './error.js';
import type { ListRequest } from './list-request.js';
import {
  DeleteResponseSchema,
  ErrorBodySchema,
  ObjectIdentifierSchema,
  StorageObjectListSchema,
} from './schema.js';
import type {
  ObjectIdentifier,
  StorageClientOptions,
  StorageObject,
  UploadData,
  UploadOptions,
} from './types.js';

interface SendOptions {
  headers?: Record<string, string>;
  body?: UploadData;
}

interface RawResponse {
  status: number;
  body: Uint8Array;
}

const decoder = new TextDecoder();

/** API キーと（あれば）アクセストークンを付与して HTTP リクエストを送る。 */
export class StorageTransport {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly accessToken?: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: StorageClientOptions) {
    this.url = options.url.replace(/\/$/, '');
    this.apiKey = options.apiKey;
    this.accessToken = options.accessToken;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = componentLogger('storage', options.logger);
  }

  async send(method: string, path: string, options: SendOptions = {}): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const started = Date.now();

    const headers: Record<string, string> = { apikey: this.apiKey, ...options.headers };
    if (this.accessToken) {
      headers['Authorization'] = `Bearer ${this.accessToken}`;
    }

    try {
      const resp = await this.fetchFn(`${this.url}${path}`, {
        method,
        headers,
        body: options.body instanceof Uint8Array ? options.body.slice() : options.body,
        signal: controller.signal,
      });
      const body = new Uint8Array(await resp.arrayBuffer());
      this.logger.debug(
        { method, path, status: resp.status, duration_ms: Date.now() - started },
        'Storage request completed',
      );
      if (!resp.ok) {
        throw httpError(resp.status, decoder.decode(body));
      }
      return { status: resp.status, body };
    } catch (e) {
      if (e instanceof StorageError) throw e;
      const cause = e instanceof Error ? e : undefined;
      if (controller.signal.aborted) {
        throw new StorageError(`Storage request timed out after ${this.timeoutMs}ms`, 'TIMEOUT', undefined, cause);
      }
      throw new StorageError(`Storage request failed: ${String(e)}`, 'NETWORK', undefined, cause);
    } finally {
      clearTimeout(timer);
    }
  }

  async sendJson<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    options: SendOptions = {},
  ): Promise<z.output<S>> {
    const resp = await this.send(method, path, options);
    let json: unknown;
    try {
      json = JSON.parse(decoder.decode(resp.body));
    } catch (e) {
      throw new StorageError(
        `Malformed JSON in response to ${method} ${path}`,
        'DECODE',
        resp.status,
        e instanceof Error ? e : undefined,
      );
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      const detail = issue ? `${issue.path.join('.')} ${issue.message}`.trim() : 'invalid';
      throw new StorageError(
        `Unexpected response to ${method} ${path}: ${detail}`,
        'DECODE',
        resp.status,
        result.error,
      );
    }
    return result.data;
  }
}

/**
 * ストレージ API はオブジェクト未検出を 400 + statusCode "404" で返すことがあるため、
 * ボディの statusCode も見てエラーコードを決める。
 */
function httpError(status: number, text: string): StorageError {
  let body: z.infer<typeof ErrorBodySchema> = {};
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) body = parsed.data;
  } catch {
    body = { message: text || undefined };
  }
  const reported = body.statusCode !== undefined ? Number(body.statusCode) : status;
  const message = body.message ?? body.error ?? `HTTP ${status}`;

  if (status === 404 || reported === 404) {
    return new StorageError(message, 'NOT_FOUND', status);
  }
  if (status === 401 || status === 403 || reported === 401 || reported === 403) {
    return new StorageError(message, 'UNAUTHORIZED', status);
  }
  return new StorageError(message, 'HTTP', status);
}

function objectPath(bucket: string, path: string): string {
  const segments = path
    .replace(/^\/+/, '')
    .split('/')
    .map((segment) => encodeURIComponent(segment));
  return `/object/${encodeURIComponent(bucket)}/${segments.join('/')}`;
}

function uploadHeaders(data: UploadData, options: UploadOptions): Record<string, string> {
  const blobType = data instanceof Blob ? data.type : '';
  const headers: Record<string, string> = {
    'Content-Type': options.contentType ?? (blobType || 'application/octet-stream'),
  };
  if (options.cacheControl !== undefined) {
    headers['cache-control'] = `max-age=${options.cacheControl}`;
  }
  if (options.upsert !== undefined) {
    headers['x-upsert'] = String(options.upsert);
  }
  return headers;
}

/** オブジェクト操作のエンドポイント。 */
export class ObjectApi {
  constructor(private readonly transport: StorageTransport) {}

  /** バケット内のオブジェクト一覧を取得する。POST /object/list/:bucket */
  async list(bucket: string, request: ListRequest): Promise<StorageObject[]> {
    return this.transport.sendJson(
      'POST',
      `/object/list/${encodeURIComponent(bucket)}`,
      StorageObjectListSchema,
      {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request.toJSON()),
      },
    );
  }

  /** オブジェクトの内容をバイト列で取得する。GET /object/:bucket/:path */
  async get(bucket: string, path: string): Promise<Uint8Array> {
    const resp = await this.transport.send('GET', objectPath(bucket, path));
    return resp.body;
  }

  /** オブジェクトを新規アップロードする。POST /object/:bucket/:path */
  async upload(
    bucket: string,
    path: string,
    data: UploadData,
    options: UploadOptions = {},
  ): Promise<ObjectIdentifier> {
    return this.transport.sendJson('POST', objectPath(bucket, path), ObjectIdentifierSchema, {
      headers: uploadHeaders(data, options),
      body: data,
    });
  }

  /** 既存オブジェクトの内容を置き換える。PUT /object/:bucket/:path */
  async update(
    bucket: string,
    path: string,
    data: UploadData,
    options: UploadOptions = {},
  ): Promise<ObjectIdentifier> {
    return this.transport.sendJson('PUT', objectPath(bucket, path), ObjectIdentifierSchema, {
      headers: uploadHeaders(data, options),
      body: data,
    });
  }

  /** オブジェクトを削除し、API のメッセージを返す。DELETE /object/:bucket/:path */
  async delete(bucket: string, path: string): Promise<string> {
    const resp = await this.transport.sendJson('DELETE', objectPath(bucket, path), DeleteResponseSchema);
    return resp.message;
  }
}

/**
 * 1 回分の認証情報を束ねたストレージクライアント。
 * トークンが更新された場合は新しいインスタンスを作り直す。
 */
export class StorageClient {
  private readonly transport: StorageTransport;

  constructor(options: StorageClientOptions) {
    this.transport = new StorageTransport(options);
  }

  object(): ObjectApi {
    return new ObjectApi(this.transport);
  }
}
