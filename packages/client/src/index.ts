/**
 * zendesk-api-client - TypeScript client for the Zendesk Support API
 *
 * Typed resources over one shared request pipeline, with offset and cursor
 * pagination and raw pass-throughs for endpoints without a typed method.
 *
 * @packageDocumentation
 */

// Main client
export { ZendeskClient } from './client.js';

// Configuration
export type { ClientConfig, EnvConfig } from './config.js';
export {
  endpointForSubdomain,
  loadConfigFromEnv,
  subdomainSchema,
  ZENDESK_HOST,
} from './config.js';
// Credentials
export type {
  BasicCredential,
  BearerCredential,
  Credential,
} from './credentials.js';
export { apiTokenAuth, basicAuth, bearerAuth } from './credentials.js';
// Errors
export type { ApiErrorResponse } from './errors/index.js';
export {
  ApiError,
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  ConfigurationError,
  EncodingError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
  ZendeskError,
} from './errors/index.js';
// Pagination
export { DEFAULT_PAGE_SIZE, PageIterator } from './pagination/index.js';
// Resources
export { GroupsResource, UsersResource } from './resources/index.js';
// Types
export type {
  CursorPaginatedResponse,
  CursorPagination,
  CursorPaginationMeta,
  Group,
  GroupCursorListOptions,
  GroupListOptions,
  GroupPaginationOptions,
  OffsetPaginatedResponse,
  Page,
  PageOptions,
  PaginationOptions,
  PaginationStrategy,
  User,
  UserCursorListOptions,
  UserListOptions,
  UserPaginationOptions,
  UserRole,
} from './types/index.js';
export { hasNextPage, hasPreviousPage } from './types/index.js';
// Utilities
export type { HttpMethod, QueryParams, RequestOptions } from './utils/index.js';
export { ACCEPTED_STATUSES, buildQuery, withQuery } from './utils/index.js';
export { VERSION } from './version.js';
