import { ZendeskError } from './base.js';

const textDecoder = new TextDecoder();

/**
 * Longest body excerpt placed in an error message; `body` keeps the rest
 */
export const MAX_MESSAGE_BODY_LENGTH = 512;

function messageFor(status: number, text: string): string {
  if (text.length === 0) {
    return `HTTP ${status} error`;
  }
  if (text.length > MAX_MESSAGE_BODY_LENGTH) {
    return `${status}: ${text.slice(0, MAX_MESSAGE_BODY_LENGTH)}...`;
  }
  return `${status}: ${text}`;
}

/**
 * Response metadata captured alongside a rejected request
 */
export interface ApiErrorResponse {
  method: string;
  url: string;
  status: number;
  statusText: string;
  headers: Headers;
}

/**
 * The server answered, but with a status outside the accepted set for the verb.
 * Carries the raw body so callers can read Zendesk's own error payload.
 */
export class ApiError extends ZendeskError {
  public readonly status: number;
  public readonly statusText: string;
  public readonly headers: Headers;
  public readonly method: string;
  public readonly url: string;

  /**
   * Exact bytes of the response body
   */
  public readonly body: Uint8Array;

  constructor(
    response: ApiErrorResponse,
    body: Uint8Array,
    options?: { retryable?: boolean },
  ) {
    super(messageFor(response.status, textDecoder.decode(body)), {
      retryable: options?.retryable ?? false,
      statusCode: response.status,
    });
    this.status = response.status;
    this.statusText = response.statusText;
    this.headers = response.headers;
    this.method = response.method;
    this.url = response.url;
    this.body = body;
  }

  /**
   * Body decoded as UTF-8
   */
  public text(): string {
    return textDecoder.decode(this.body);
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends ApiError {}

/**
 * 401 Unauthorized - requires new credentials
 */
export class AuthenticationError extends ApiError {}

/**
 * 403 Forbidden - requires different permissions
 */
export class AuthorizationError extends ApiError {}

/**
 * 404 Not Found
 */
export class NotFoundError extends ApiError {}

/**
 * 429 Too Many Requests
 */
export class RateLimitError extends ApiError {
  /**
   * Seconds to wait before retrying (from Retry-After header)
   */
  public readonly retryAfter?: number;

  constructor(response: ApiErrorResponse, body: Uint8Array) {
    super(response, body, { retryable: true });

    const retryAfter = response.headers.get('Retry-After');
    if (retryAfter !== null) {
      const seconds = parseInt(retryAfter, 10);
      if (!Number.isNaN(seconds)) {
        this.retryAfter = seconds;
      }
    }
  }
}

/**
 * 5xx
 */
export class ServerError extends ApiError {
  constructor(response: ApiErrorResponse, body: Uint8Array) {
    super(response, body, { retryable: true });
  }
}

/**
 * Map a rejected response to the matching ApiError subclass
 */
export function createApiError(
  response: ApiErrorResponse,
  body: Uint8Array,
): ApiError {
  switch (response.status) {
    case 400:
      return new BadRequestError(response, body);
    case 401:
      return new AuthenticationError(response, body);
    case 403:
      return new AuthorizationError(response, body);
    case 404:
      return new NotFoundError(response, body);
    case 429:
      return new RateLimitError(response, body);
    default:
      if (response.status >= 500) {
        return new ServerError(response, body);
      }
      return new ApiError(response, body);
  }
}
