/**
 * Security requirement and verdict model.
 *
 * A requirement comes from one of two sources: a declarative attachment on
 * the operation, or an explicit registry entry for its (path, verb). The
 * registry entry always wins; the two are never merged.
 */

import type { ExecutionContext } from '../context/executionContext.js';

export interface SecurityRequirement {
    readonly roles: ReadonlySet<string>;
    readonly permissions: ReadonlySet<string>;
    /** AND-mode for roles; OR-mode when false */
    readonly requireAllRoles: boolean;
    /** AND-mode for permissions; OR-mode when false */
    readonly requireAllPermissions: boolean;
    readonly allowAnonymous: boolean;
    readonly requiresAuthentication: boolean;
}

export interface RequirementInput {
    roles?: Iterable<string>;
    permissions?: Iterable<string>;
    requireAllRoles?: boolean;
    requireAllPermissions?: boolean;
    allowAnonymous?: boolean;
    requiresAuthentication?: boolean;
}

export type RequirementSource = 'declarative' | 'registry' | 'external-evaluator' | 'default-deny';

export type DenialReason = 'Unauthenticated' | 'RoleMismatch' | 'PermissionMismatch' | 'DefaultDeny';

export type AuthorizationVerdict =
    | {
        readonly granted: true;
        readonly requirement: SecurityRequirement;
        readonly source: RequirementSource;
    }
    | {
        readonly granted: false;
        readonly reason: DenialReason;
        readonly requirement: SecurityRequirement;
        readonly source: RequirementSource;
        /** Human-readable specifics, e.g. the required roles */
        readonly detail?: string;
    };

/**
 * Operation being invoked, as seen by the precedence lookup.
 */
export interface OperationDescriptor {
    /** Path pattern the operation is mounted under, e.g. /contracts/{contractId} */
    readonly path: string;
    readonly verb: string;
    /** Declarative requirement attached to the operation, if any */
    readonly requirement?: SecurityRequirement | null;
    /** Operation explicitly open to anonymous callers */
    readonly allowAnonymous?: boolean;
}

/**
 * Optional collaborator that takes over the decision for authenticated
 * callers. Its verdict is adopted verbatim.
 */
export interface ExternalPolicyEvaluator {
    evaluateExternalPolicy(
        context: ExecutionContext,
        requirement: SecurityRequirement
    ): Promise<AuthorizationVerdict>;
}

export function defineRequirement(input: RequirementInput = {}): SecurityRequirement {
    return Object.freeze({
        roles: new Set(input.roles ?? []),
        permissions: new Set(input.permissions ?? []),
        requireAllRoles: input.requireAllRoles ?? false,
        requireAllPermissions: input.requireAllPermissions ?? false,
        allowAnonymous: input.allowAnonymous ?? false,
        requiresAuthentication: input.requiresAuthentication ?? true
    });
}

export const ANONYMOUS_REQUIREMENT: SecurityRequirement = defineRequirement({
    allowAnonymous: true,
    requiresAuthentication: false
});

/** Evaluated when no source supplies a requirement. */
export const DENY_ALL_REQUIREMENT: SecurityRequirement = defineRequirement();

export function describeRequirement(requirement: SecurityRequirement) {
    return {
        roles: [...requirement.roles].sort(),
        permissions: [...requirement.permissions].sort(),
        requireAllRoles: requirement.requireAllRoles,
        requireAllPermissions: requirement.requireAllPermissions,
        allowAnonymous: requirement.allowAnonymous,
        requiresAuthentication: requirement.requiresAuthentication
    };
}
