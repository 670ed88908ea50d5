/**
 * Session Mapper
 *
 * Derives role names and permission strings from a session snapshot for a
 * given scope:
 * - party-level: no contractId/productId, every active membership contributes
 * - contract-level: memberships of that contract only
 * - product-level: memberships of that contract whose product matches
 *
 * Permission format: {roleCode}:{actionType}:{resourceType}
 * e.g. owner:READ:BALANCE, account_viewer:READ:TRANSACTION
 *
 * Pure functions; output depends only on the arguments.
 */

import { logger } from '../logging/logger.js';
import type { ActionScope, ContractMembership, SessionRecord } from './session.js';

const UNKNOWN_ROLE = 'unknown';

function scopedMemberships(
    session: SessionRecord | null | undefined,
    contractId?: string | null,
    productId?: string | null
): ContractMembership[] {
    if (!session?.memberships) {
        return [];
    }

    return session.memberships.filter(membership => {
        if (membership.active !== true) return false;
        if (contractId && membership.contractId !== contractId) return false;
        if (productId && membership.product?.productId !== productId) return false;
        return true;
    });
}

function isUsableScope(scope: ActionScope): scope is ActionScope & { actionType: string; resourceType: string } {
    return scope.active === true && !!scope.actionType && !!scope.resourceType;
}

export function formatPermission(roleCode: string | null | undefined, actionType: string, resourceType: string): string {
    return `${roleCode || UNKNOWN_ROLE}:${actionType}:${resourceType}`;
}

export function extractRoles(
    session: SessionRecord | null | undefined,
    contractId?: string | null,
    productId?: string | null
): Set<string> {
    const roles = new Set<string>();

    for (const membership of scopedMemberships(session, contractId, productId)) {
        const grant = membership.roleGrant;
        if (!grant || grant.active !== true) continue;

        const roleCode = grant.roleCode?.trim();
        if (roleCode) {
            roles.add(roleCode);
        }
    }

    logger.debug({ contractId: contractId ?? null, productId: productId ?? null, count: roles.size }, 'Extracted session roles');
    return roles;
}

export function extractPermissions(
    session: SessionRecord | null | undefined,
    contractId?: string | null,
    productId?: string | null
): Set<string> {
    const permissions = new Set<string>();

    for (const membership of scopedMemberships(session, contractId, productId)) {
        const grant = membership.roleGrant;
        if (!grant || grant.active !== true || !grant.scopes) continue;

        for (const scope of grant.scopes) {
            if (isUsableScope(scope)) {
                permissions.add(formatPermission(grant.roleCode?.trim(), scope.actionType, scope.resourceType));
            }
        }
    }

    logger.debug({ contractId: contractId ?? null, productId: productId ?? null, count: permissions.size }, 'Extracted session permissions');
    return permissions;
}

/**
 * True when any active membership references the product.
 */
export function hasAccessToProduct(session: SessionRecord | null | undefined, productId: string | null | undefined): boolean {
    if (!productId || !session?.memberships) {
        return false;
    }
    return session.memberships.some(membership =>
        membership.active === true && membership.product?.productId === productId
    );
}

/**
 * True when an active scope on the product grants the action (and, when
 * given, the resource). Both comparisons ignore case.
 */
export function hasScopedPermission(
    session: SessionRecord | null | undefined,
    productId: string | null | undefined,
    actionType: string | null | undefined,
    resourceType?: string | null
): boolean {
    if (!productId || !actionType || !session?.memberships) {
        return false;
    }

    const action = actionType.toUpperCase();
    const resource = resourceType?.toUpperCase();

    return session.memberships
        .filter(membership => membership.active === true && membership.product?.productId === productId)
        .flatMap(membership => membership.roleGrant?.scopes ?? [])
        .some(scope =>
            scope.active === true &&
            scope.actionType?.toUpperCase() === action &&
            (resource === undefined || scope.resourceType?.toUpperCase() === resource)
        );
}
