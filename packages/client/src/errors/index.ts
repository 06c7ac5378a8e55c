export { ConfigurationError, ZendeskError } from './base.js';
export type { ApiErrorResponse } from './http.js';
export {
  ApiError,
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  createApiError,
  MAX_MESSAGE_BODY_LENGTH,
  NotFoundError,
  RateLimitError,
  ServerError,
} from './http.js';
export { EncodingError, NetworkError } from './transport.js';
export { ValidationError } from './validation.js';
