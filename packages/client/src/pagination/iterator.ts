import {
  type CursorPaginatedResponse,
  type CursorPagination,
  hasNextPage,
  type OffsetPaginatedResponse,
  type PageOptions,
  type PaginationOptions,
  type PaginationStrategy,
} from '../types/index.js';

export const DEFAULT_PAGE_SIZE = 100;

export interface PageFetchers<T> {
  offset(page: PageOptions): Promise<OffsetPaginatedResponse<T>>;
  cursor(cursor: CursorPagination): Promise<CursorPaginatedResponse<T>>;
}

/**
 * Walks a list endpoint page by page, advancing the cursor (or page number)
 * from the previous response. Forward-only and not restartable: once
 * consumed, iterating again yields nothing.
 *
 * @example
 * ```typescript
 * for await (const group of client.groups.iterate({ page_size: 50 })) {
 *   console.log(group.name);
 * }
 * ```
 */
export class PageIterator<T> implements AsyncIterable<T> {
  private readonly fetchers: PageFetchers<T>;
  private readonly pageSize: number;
  private readonly strategy: PaginationStrategy;

  private more = true;
  private pageIndex = 1;
  private afterCursor: string | undefined;

  /**
   * Tail of the chain of page requests; overlapping getNext() calls wait on it
   */
  private pending: Promise<unknown> = Promise.resolve();

  constructor(fetchers: PageFetchers<T>, options?: PaginationOptions) {
    this.fetchers = fetchers;
    this.pageSize = options?.page_size ?? DEFAULT_PAGE_SIZE;
    this.strategy = options?.strategy ?? 'cursor';
  }

  /**
   * Whether another page may be fetched
   */
  hasMore(): boolean {
    return this.more;
  }

  /**
   * Fetch the next page of items; returns [] once exhausted.
   * Overlapping calls run one after another, in call order.
   */
  getNext(): Promise<T[]> {
    const next = this.pending.then(() => this.fetchPage());
    // a failed page rejects `next` for its caller; later calls still run
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async fetchPage(): Promise<T[]> {
    if (!this.more) {
      return [];
    }

    if (this.strategy === 'offset') {
      const response = await this.fetchers.offset({
        page: this.pageIndex,
        per_page: this.pageSize,
      });
      this.more = hasNextPage(response.page);
      this.pageIndex += 1;
      return response.items;
    }

    const cursor: CursorPagination = { page_size: this.pageSize };
    if (this.afterCursor !== undefined) {
      cursor.page_after = this.afterCursor;
    }

    const response = await this.fetchers.cursor(cursor);
    this.afterCursor = response.meta.after_cursor;
    // has_more without a cursor would refetch the first page forever
    this.more = response.meta.has_more && this.afterCursor !== undefined;
    return response.items;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (this.more) {
      const items = await this.getNext();
      yield* items;
    }
  }
}
