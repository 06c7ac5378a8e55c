import { z } from 'zod';
import { omitEmpty, requiredString } from './common.js';

export const userRoleSchema = z.enum(['end-user', 'agent', 'admin']);

/**
 * User payload
 * https://developer.zendesk.com/api-reference/ticketing/users/users/
 */
export const userSchema = z.object({
  id: omitEmpty(z.number().int()),
  url: omitEmpty(z.string()),
  name: requiredString(),
  email: omitEmpty(z.string()),
  role: omitEmpty(z.string()),
  active: omitEmpty(z.boolean()),
  verified: omitEmpty(z.boolean()),
  suspended: omitEmpty(z.boolean()),
  phone: omitEmpty(z.string()),
  time_zone: omitEmpty(z.string()),
  locale: omitEmpty(z.string()),
  default_group_id: omitEmpty(z.number().int()),
  organization_id: omitEmpty(z.number().int()),
  tags: omitEmpty(z.array(z.string())),
  created_at: omitEmpty(z.string()),
  updated_at: omitEmpty(z.string()),
});
