import { z } from 'zod';
import { omitEmpty, requiredString } from './common.js';

/**
 * Group payload
 * https://developer.zendesk.com/api-reference/ticketing/groups/groups/
 */
export const groupSchema = z.object({
  id: omitEmpty(z.number().int()),
  url: omitEmpty(z.string()),
  name: requiredString(),
  default: omitEmpty(z.boolean()),
  deleted: omitEmpty(z.boolean()),
  description: omitEmpty(z.string()),
  created_at: omitEmpty(z.string()),
  updated_at: omitEmpty(z.string()),
});
