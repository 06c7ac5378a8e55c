export type {
  CursorPaginatedResponse,
  CursorPagination,
  CursorPaginationMeta,
  OffsetPaginatedResponse,
  Page,
  PageOptions,
  PaginationOptions,
  PaginationStrategy,
} from './common.js';
export { hasNextPage, hasPreviousPage } from './common.js';
export type {
  Group,
  GroupCursorListOptions,
  GroupFilterOptions,
  GroupListOptions,
  GroupPaginationOptions,
} from './group.js';
export type {
  User,
  UserCursorListOptions,
  UserFilterOptions,
  UserListOptions,
  UserPaginationOptions,
  UserRole,
} from './user.js';
