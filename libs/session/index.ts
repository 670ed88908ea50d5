/**
 * Public exports for the session module.
 */

export type {
    ActionScope,
    RoleGrant,
    ProductReference,
    ContractMembership,
    SessionRecord,
    SessionSource
} from './session.js';

export {
    extractRoles,
    extractPermissions,
    formatPermission,
    hasAccessToProduct,
    hasScopedPermission
} from './sessionMapper.js';
export { PostgresSessionSource } from './repository.js';
