import { z } from 'zod';
import { omitEmpty } from './common.js';

/**
 * Offset pagination metadata embedded at the top level of list responses
 */
export const pageSchema = z.object({
  next_page: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  previous_page: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  count: z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? 0),
});

/**
 * Cursor pagination metadata found under `meta`
 */
export const cursorPaginationMetaSchema = z.object({
  has_more: z
    .boolean()
    .nullish()
    .transform((value) => value ?? false),
  after_cursor: omitEmpty(z.string()),
  before_cursor: omitEmpty(z.string()),
});

export const cursorEnvelopeSchema = z.object({
  meta: cursorPaginationMetaSchema.default({}),
});
