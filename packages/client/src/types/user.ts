import type { z } from 'zod';
import type { userRoleSchema, userSchema } from '../schemas/user.js';
import type {
  CursorPagination,
  PageOptions,
  PaginationOptions,
} from './common.js';

/**
 * User resource from the API
 */
export type User = z.infer<typeof userSchema>;

export type UserRole = z.infer<typeof userRoleSchema>;

export interface UserFilterOptions {
  role?: UserRole;
  /**
   * Several roles at once, sent as `role[]`
   */
  roles?: UserRole[];
  permission_set?: number;
}

export interface UserListOptions extends PageOptions, UserFilterOptions {}

export interface UserCursorListOptions
  extends CursorPagination,
    UserFilterOptions {}

export interface UserPaginationOptions
  extends PaginationOptions,
    UserFilterOptions {}
