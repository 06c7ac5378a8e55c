export { BaseResource } from './base.js';
export { GroupsResource } from './groups.js';
export { UsersResource } from './users.js';
