import { StorageError } from './error.js';

export const SortOrder = {
  Ascending: 'asc',
  Descending: 'desc',
} as const;

export type SortOrder = (typeof SortOrder)[keyof typeof SortOrder];

export interface SortBy {
  column: string;
  order: SortOrder;
}

/** POST /object/list/:bucket のリクエストボディ。未指定の項目は送らない。 */
export interface ListRequestBody {
  prefix: string;
  limit?: number;
  offset?: number;
  sortBy?: SortBy;
  search?: string;
}

interface ListOptions {
  limit?: number;
  offset?: number;
  sortBy?: SortBy;
  search?: string;
}

/**
 * オブジェクト一覧取得の条件。各メソッドは新しいインスタンスを返す。
 *
 * @example
 * ```typescript
 * const req = new ListRequest('avatars/').limit(10).sortBy('name', SortOrder.Descending);
 * ```
 */
export class ListRequest {
  constructor(
    readonly prefix: string = '',
    private readonly options: ListOptions = {},
  ) {}

  limit(limit: number): ListRequest {
    assertCount('limit', limit);
    return new ListRequest(this.prefix, { ...this.options, limit });
  }

  offset(offset: number): ListRequest {
    assertCount('offset', offset);
    return new ListRequest(this.prefix, { ...this.options, offset });
  }

  sortBy(column: string, order: SortOrder = SortOrder.Ascending): ListRequest {
    if (order !== SortOrder.Ascending && order !== SortOrder.Descending) {
      throw new StorageError(`Invalid sort order: ${String(order)}`, 'INVALID_REQUEST');
    }
    if (column === '') {
      throw new StorageError('Sort column must not be empty', 'INVALID_REQUEST');
    }
    return new ListRequest(this.prefix, { ...this.options, sortBy: { column, order } });
  }

  search(search: string): ListRequest {
    return new ListRequest(this.prefix, { ...this.options, search });
  }

  toJSON(): ListRequestBody {
    const body: ListRequestBody = { prefix: this.prefix };
    if (this.options.limit !== undefined) body.limit = this.options.limit;
    if (this.options.offset !== undefined) body.offset = this.options.offset;
    if (this.options.sortBy !== undefined) body.sortBy = { ...this.options.sortBy };
    if (this.options.search !== undefined) body.search = this.options.search;
    return body;
  }
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new StorageError(`${name} must be a non-negative integer: ${value}`, 'INVALID_REQUEST');
  }
}
