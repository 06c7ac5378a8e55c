import type { z } from 'zod';
import type {
  cursorPaginationMetaSchema,
  pageSchema,
} from '../schemas/pagination.js';

/**
 * Offset pagination inputs (`page`, `per_page`)
 */
export interface PageOptions {
  page?: number;
  per_page?: number;
}

/**
 * Offset pagination metadata: next/previous page URLs and total count
 */
export type Page = z.infer<typeof pageSchema>;

/**
 * Cursor pagination inputs (`page[size]`, `page[after]`, `page[before]`).
 * Cursors are opaque and passed back exactly as received.
 */
export interface CursorPagination {
  /**
   * Most endpoints support up to 100 records per page
   */
  page_size?: number;
  page_after?: string;
  page_before?: string;
}

/**
 * Cursor pagination metadata
 */
export type CursorPaginationMeta = z.infer<typeof cursorPaginationMetaSchema>;

/**
 * Offset-based list result
 */
export interface OffsetPaginatedResponse<T> {
  items: T[];
  page: Page;
}

/**
 * Cursor-based list result
 */
export interface CursorPaginatedResponse<T> {
  items: T[];
  meta: CursorPaginationMeta;
}

export type PaginationStrategy = 'cursor' | 'offset';

/**
 * Options for PageIterator
 */
export interface PaginationOptions {
  /**
   * @default 100
   */
  page_size?: number;

  /**
   * @default 'cursor'
   */
  strategy?: PaginationStrategy;
}

export function hasNextPage(page: Page): boolean {
  return page.next_page !== null;
}

export function hasPreviousPage(page: Page): boolean {
  return page.previous_page !== null;
}
