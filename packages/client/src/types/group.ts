import type { z } from 'zod';
import type { groupSchema } from '../schemas/group.js';
import type {
  CursorPagination,
  PageOptions,
  PaginationOptions,
} from './common.js';

/**
 * Group resource from the API
 */
export type Group = z.infer<typeof groupSchema>;

export interface GroupFilterOptions {
  exclude_deleted?: boolean;
}

export interface GroupListOptions extends PageOptions, GroupFilterOptions {}

export interface GroupCursorListOptions
  extends CursorPagination,
    GroupFilterOptions {}

export interface GroupPaginationOptions
  extends PaginationOptions,
    GroupFilterOptions {}
