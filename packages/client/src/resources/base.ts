import type { z } from 'zod';
import { EncodingError, ValidationError } from '../errors/index.js';
import {
  cursorEnvelopeSchema,
  entityOf,
  listOf,
  pageSchema,
} from '../schemas/index.js';
import type {
  CursorPaginatedResponse,
  OffsetPaginatedResponse,
} from '../types/index.js';
import {
  decodeEnvelope,
  decodeJson,
  type RequestOptions,
  type Requester,
  unwrap,
  wrap,
} from '../utils/index.js';

/**
 * Base resource class with the envelope helpers every resource shares
 */
export abstract class BaseResource {
  protected readonly http: Requester;

  constructor(http: Requester) {
    this.http = http;
  }

  /**
   * Validate data against a Zod schema
   * @throws {ValidationError} if validation fails
   */
  protected validate<S extends z.ZodTypeAny>(data: unknown, schema: S): z.output<S> {
    const result = schema.safeParse(data);

    if (!result.success) {
      throw new ValidationError('API response validation failed', result.error);
    }

    return result.data;
  }

  /**
   * GET a single entity stored under `key`
   */
  protected async fetchOne<S extends z.ZodTypeAny>(
    path: string,
    key: string,
    schema: S,
    options?: RequestOptions,
  ): Promise<z.output<S>> {
    const body = await this.http.get(path, options);
    return unwrap(body, key, entityOf(schema));
  }

  /**
   * Encode `value` under `key`, send it, decode the echoed entity.
   * Empty optional fields are dropped by the schema before sending.
   * @throws {EncodingError} if `value` does not fit the entity shape
   */
  protected async send<S extends z.ZodTypeAny>(
    method: 'post' | 'put' | 'patch',
    path: string,
    key: string,
    schema: S,
    value: z.input<S>,
    options?: RequestOptions,
  ): Promise<z.output<S>> {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new EncodingError(
        `Unable to encode request body: "${key}" does not match the expected shape`,
        result.error,
      );
    }

    const body = await this.http[method](path, wrap(key, result.data), options);
    return unwrap(body, key, entityOf(schema));
  }

  /**
   * GET an offset-paginated list stored under `key`
   */
  protected async fetchOffsetPage<S extends z.ZodTypeAny>(
    path: string,
    key: string,
    itemSchema: S,
    options?: RequestOptions,
  ): Promise<OffsetPaginatedResponse<z.output<S>>> {
    const json = decodeJson(await this.http.get(path, options));
    return {
      items: decodeEnvelope(json, key, listOf(itemSchema)),
      page: this.validate(json, pageSchema),
    };
  }

  /**
   * GET a cursor-paginated list stored under `key`
   */
  protected async fetchCursorPage<S extends z.ZodTypeAny>(
    path: string,
    key: string,
    itemSchema: S,
    options?: RequestOptions,
  ): Promise<CursorPaginatedResponse<z.output<S>>> {
    const json = decodeJson(await this.http.get(path, options));
    return {
      items: decodeEnvelope(json, key, listOf(itemSchema)),
      meta: this.validate(json, cursorEnvelopeSchema).meta,
    };
  }
}
