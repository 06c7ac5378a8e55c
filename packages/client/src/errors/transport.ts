import { ZendeskError } from './base.js';

/**
 * Transport failure before any status code exists
 * (connection refused, DNS, TLS, timeout, abort, body read)
 */
export class NetworkError extends ZendeskError {
  constructor(message: string, cause?: unknown) {
    super(message, { retryable: false, cause });
  }
}

/**
 * Request body could not be serialized to JSON
 */
export class EncodingError extends ZendeskError {
  constructor(message: string, cause?: unknown) {
    super(message, { retryable: false, cause });
  }
}
