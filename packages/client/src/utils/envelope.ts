import type { z } from 'zod';
import { EncodingError, ValidationError } from '../errors/index.js';

const textDecoder = new TextDecoder();

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serialize a request body. `undefined` is sent as JSON null.
 * @throws {EncodingError} if the value cannot be represented as JSON
 */
export function encodeJson(data: unknown): string {
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(data ?? null);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EncodingError(`Unable to encode request body: ${reason}`, error);
  }

  if (encoded === undefined) {
    throw new EncodingError('Unable to encode request body: value is not JSON');
  }
  return encoded;
}

/**
 * Parse a raw response body as JSON
 * @throws {ValidationError} if the body is not valid JSON
 */
export function decodeJson(body: Uint8Array): unknown {
  const text = textDecoder.decode(body);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ValidationError('Response body is not valid JSON', undefined, error);
  }
}

/**
 * Wrap a payload in its single-key envelope, e.g. `{ "group": {...} }`
 */
export function wrap<T>(key: string, value: T): Record<string, T> {
  return { [key]: value };
}

/**
 * Decode the value stored under `key` in an already-parsed JSON document.
 * A missing or null envelope reaches the schema as `undefined`.
 * @throws {ValidationError} if the value does not match the schema
 */
export function decodeEnvelope<S extends z.ZodTypeAny>(
  json: unknown,
  key: string,
  schema: S,
): z.output<S> {
  const value = isRecord(json) ? json[key] : undefined;

  const result = schema.safeParse(value ?? undefined);
  if (!result.success) {
    throw new ValidationError(
      `Response "${key}" does not match the expected shape`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Parse a raw body and decode the value under its envelope key
 */
export function unwrap<S extends z.ZodTypeAny>(
  body: Uint8Array,
  key: string,
  schema: S,
): z.output<S> {
  return decodeEnvelope(decodeJson(body), key, schema);
}
