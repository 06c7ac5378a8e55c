/**
 * Base error class for all Zendesk client errors
 */
export class ZendeskError extends Error {
  /**
   * Hint for callers deciding whether the failure is transient.
   * The client itself never retries.
   */
  public readonly retryable: boolean;

  /**
   * HTTP status code if a response was received
   */
  public readonly statusCode?: number;

  /**
   * Original error cause
   */
  public override readonly cause?: unknown;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      statusCode?: number;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Client configuration is invalid, incomplete, or can no longer be changed
 */
export class ConfigurationError extends ZendeskError {
  constructor(message: string, cause?: unknown) {
    super(message, { retryable: false, cause });
  }
}
