import { PageIterator } from '../pagination/index.js';
import { userSchema } from '../schemas/index.js';
import type {
  CursorPaginatedResponse,
  OffsetPaginatedResponse,
  User,
  UserCursorListOptions,
  UserFilterOptions,
  UserListOptions,
  UserPaginationOptions,
} from '../types/index.js';
import { type QueryParams, type RequestOptions, withQuery } from '../utils/index.js';
import { BaseResource } from './base.js';

function filterParams(options?: UserFilterOptions): QueryParams {
  return {
    role: options?.role,
    'role[]': options?.roles,
    permission_set: options?.permission_set,
  };
}

/**
 * Users API resource
 * https://developer.zendesk.com/api-reference/ticketing/users/users/
 */
export class UsersResource extends BaseResource {
  async list(
    options?: UserListOptions,
    requestOptions?: RequestOptions,
  ): Promise<OffsetPaginatedResponse<User>> {
    const path = withQuery('/users.json', {
      page: options?.page,
      per_page: options?.per_page,
      ...filterParams(options),
    });
    return this.fetchOffsetPage(path, 'users', userSchema, requestOptions);
  }

  async listCursor(
    options?: UserCursorListOptions,
    requestOptions?: RequestOptions,
  ): Promise<CursorPaginatedResponse<User>> {
    const path = withQuery('/users.json', {
      'page[size]': options?.page_size,
      'page[after]': options?.page_after,
      'page[before]': options?.page_before,
      ...filterParams(options),
    });
    return this.fetchCursorPage(path, 'users', userSchema, requestOptions);
  }

  iterate(
    options?: UserPaginationOptions,
    requestOptions?: RequestOptions,
  ): PageIterator<User> {
    const filters: UserFilterOptions = {
      role: options?.role,
      roles: options?.roles,
      permission_set: options?.permission_set,
    };
    return new PageIterator<User>(
      {
        offset: (page) => this.list({ ...filters, ...page }, requestOptions),
        cursor: (cursor) =>
          this.listCursor({ ...filters, ...cursor }, requestOptions),
      },
      options,
    );
  }

  async get(id: number, requestOptions?: RequestOptions): Promise<User> {
    return this.fetchOne(`/users/${id}.json`, 'user', userSchema, requestOptions);
  }

  async create(user: User, requestOptions?: RequestOptions): Promise<User> {
    return this.send('post', '/users.json', 'user', userSchema, user, requestOptions);
  }

  /**
   * Create the user, or update the existing one matched by email or external ID.
   * The API answers 201 on create and 200 on update.
   */
  async createOrUpdate(
    user: User,
    requestOptions?: RequestOptions,
  ): Promise<User> {
    return this.send(
      'post',
      '/users/create_or_update.json',
      'user',
      userSchema,
      user,
      requestOptions,
    );
  }

  async update(
    id: number,
    user: User,
    requestOptions?: RequestOptions,
  ): Promise<User> {
    return this.send('put', `/users/${id}.json`, 'user', userSchema, user, requestOptions);
  }
}
