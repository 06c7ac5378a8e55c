import { z } from 'zod';

/**
 * Zero values that "omit if empty" fields drop on the way out and treat
 * as not provided on the way in
 */
export function isEmptyValue(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === '' ||
    value === 0 ||
    value === false ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * Wrap a field schema with "omit if empty" semantics
 */
export const omitEmpty = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(
    (value) => (isEmptyValue(value) ? undefined : value),
    schema.optional(),
  );

/**
 * Required string field; absent or null decodes as ''
 */
export const requiredString = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? '');

/**
 * Entity envelope; missing or null decodes from `{}`
 */
export const entityOf = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => value ?? {}, schema);

/**
 * List envelope; missing or null decodes as []
 */
export const listOf = <T extends z.ZodTypeAny>(schema: T) =>
  z
    .array(schema)
    .nullish()
    .transform((items): z.output<T>[] => items ?? []);
