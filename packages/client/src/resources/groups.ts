import { PageIterator } from '../pagination/index.js';
import { groupSchema } from '../schemas/index.js';
import type {
  CursorPaginatedResponse,
  Group,
  GroupCursorListOptions,
  GroupListOptions,
  GroupPaginationOptions,
  OffsetPaginatedResponse,
} from '../types/index.js';
import { type RequestOptions, withQuery } from '../utils/index.js';
import { BaseResource } from './base.js';

/**
 * Groups API resource
 * https://developer.zendesk.com/api-reference/ticketing/groups/groups/
 */
export class GroupsResource extends BaseResource {
  /**
   * List groups with offset pagination
   */
  async list(
    options?: GroupListOptions,
    requestOptions?: RequestOptions,
  ): Promise<OffsetPaginatedResponse<Group>> {
    const path = withQuery('/groups.json', {
      page: options?.page,
      per_page: options?.per_page,
      exclude_deleted: options?.exclude_deleted,
    });
    return this.fetchOffsetPage(path, 'groups', groupSchema, requestOptions);
  }

  /**
   * List groups with cursor pagination
   */
  async listCursor(
    options?: GroupCursorListOptions,
    requestOptions?: RequestOptions,
  ): Promise<CursorPaginatedResponse<Group>> {
    const path = withQuery('/groups.json', {
      'page[size]': options?.page_size,
      'page[after]': options?.page_after,
      'page[before]': options?.page_before,
      exclude_deleted: options?.exclude_deleted,
    });
    return this.fetchCursorPage(path, 'groups', groupSchema, requestOptions);
  }

  /**
   * Iterate over every group, cursor-paginated unless `strategy: 'offset'`
   */
  iterate(
    options?: GroupPaginationOptions,
    requestOptions?: RequestOptions,
  ): PageIterator<Group> {
    const filters = { exclude_deleted: options?.exclude_deleted };
    return new PageIterator<Group>(
      {
        offset: (page) => this.list({ ...filters, ...page }, requestOptions),
        cursor: (cursor) =>
          this.listCursor({ ...filters, ...cursor }, requestOptions),
      },
      options,
    );
  }

  /**
   * Get a single group by ID
   */
  async get(id: number, requestOptions?: RequestOptions): Promise<Group> {
    return this.fetchOne(`/groups/${id}.json`, 'group', groupSchema, requestOptions);
  }

  /**
   * Create a new group
   */
  async create(group: Group, requestOptions?: RequestOptions): Promise<Group> {
    return this.send('post', '/groups.json', 'group', groupSchema, group, requestOptions);
  }

  /**
   * Update an existing group
   */
  async update(
    id: number,
    group: Group,
    requestOptions?: RequestOptions,
  ): Promise<Group> {
    return this.send('put', `/groups/${id}.json`, 'group', groupSchema, group, requestOptions);
  }

  /**
   * Delete a group
   */
  async delete(id: number, requestOptions?: RequestOptions): Promise<void> {
    await this.http.delete(`/groups/${id}.json`, undefined, requestOptions);
  }
}
