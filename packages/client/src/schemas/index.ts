export {
  entityOf,
  isEmptyValue,
  listOf,
  omitEmpty,
  requiredString,
} from './common.js';
export { groupSchema } from './group.js';
export {
  cursorEnvelopeSchema,
  cursorPaginationMetaSchema,
  pageSchema,
} from './pagination.js';
export { userRoleSchema, userSchema } from './user.js';
