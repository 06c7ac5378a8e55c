import type { ZodError } from 'zod';
import { ZendeskError } from './base.js';

/**
 * Response body could not be decoded into the expected shape
 */
export class ValidationError extends ZendeskError {
  /**
   * Zod decoding issues, absent when the body was not JSON at all
   */
  public readonly validationErrors?: ZodError;

  constructor(message: string, validationErrors?: ZodError, cause?: unknown) {
    super(message, { retryable: false, cause });
    this.validationErrors = validationErrors;
  }

  /**
   * Get a formatted string of validation errors
   */
  public getValidationDetails(): string {
    if (!this.validationErrors) {
      return this.message;
    }

    const errors = this.validationErrors.issues
      .map((err) => `${err.path.map(String).join('.')}: ${err.message}`)
      .join(', ');

    return `${this.message} - ${errors}`;
  }
}
