/**
 * Security Decision Engine
 *
 * Evaluation order:
 * 1. allowAnonymous grants immediately
 * 2. requiresAuthentication without an identity denies (Unauthenticated)
 * 3. external evaluator, when configured, takes the decision verbatim
 * 4. role match (AND / OR) else RoleMismatch
 * 5. permission match (AND / OR) else PermissionMismatch
 *
 * Denials are verdicts, never exceptions. Nothing is cached: every call
 * evaluates the context and requirement it is given.
 */

import type { ExecutionContext } from '../context/executionContext.js';
import { logger } from '../logging/logger.js';
import { resolveRequirement } from './precedence.js';
import type { RequirementLookup } from './registry.js';
import type {
    AuthorizationVerdict,
    DenialReason,
    ExternalPolicyEvaluator,
    OperationDescriptor,
    RequirementSource,
    SecurityRequirement
} from './requirement.js';

export interface SecurityDecisionEngineOptions {
    registry: RequirementLookup;
    externalEvaluator?: ExternalPolicyEvaluator;
}

/**
 * AND-mode: every required value held. OR-mode: at least one held.
 * An empty requirement set is always satisfied.
 */
export function matchesRequired(
    required: ReadonlySet<string>,
    held: ReadonlySet<string>,
    requireAll: boolean
): boolean {
    if (required.size === 0) return true;

    let matched = 0;
    for (const value of required) {
        if (held.has(value)) matched++;
    }

    return requireAll ? matched === required.size : matched > 0;
}

function hasIdentity(context: ExecutionContext | null | undefined): context is ExecutionContext {
    return !!context && context.identityId.trim().length > 0;
}

function grant(requirement: SecurityRequirement, source: RequirementSource): AuthorizationVerdict {
    return { granted: true, requirement, source };
}

function deny(
    reason: DenialReason,
    requirement: SecurityRequirement,
    source: RequirementSource,
    detail?: string
): AuthorizationVerdict {
    return detail === undefined
        ? { granted: false, reason, requirement, source }
        : { granted: false, reason, requirement, source, detail };
}

function listOf(values: ReadonlySet<string>): string {
    return [...values].sort().join(', ');
}

/**
 * Local evaluation of a requirement against a context (steps 1, 2, 4, 5).
 */
export function evaluateRequirement(
    context: ExecutionContext | null | undefined,
    requirement: SecurityRequirement,
    source: RequirementSource = 'declarative'
): AuthorizationVerdict {
    if (source === 'default-deny') {
        return deny('DefaultDeny', requirement, source, 'No security requirement defined for operation');
    }

    if (requirement.allowAnonymous) {
        return grant(requirement, source);
    }

    if (requirement.requiresAuthentication && !hasIdentity(context)) {
        return deny('Unauthenticated', requirement, source);
    }

    const roles = context?.roles ?? new Set<string>();
    const permissions = context?.permissions ?? new Set<string>();

    if (!matchesRequired(requirement.roles, roles, requirement.requireAllRoles)) {
        const mode = requirement.requireAllRoles ? 'all of' : 'any of';
        return deny('RoleMismatch', requirement, source, `Requires ${mode}: ${listOf(requirement.roles)}`);
    }

    if (!matchesRequired(requirement.permissions, permissions, requirement.requireAllPermissions)) {
        const mode = requirement.requireAllPermissions ? 'all of' : 'any of';
        return deny('PermissionMismatch', requirement, source, `Requires ${mode}: ${listOf(requirement.permissions)}`);
    }

    return grant(requirement, source);
}

export class SecurityDecisionEngine {
    private readonly registry: RequirementLookup;
    private readonly externalEvaluator?: ExternalPolicyEvaluator;

    constructor(options: SecurityDecisionEngineOptions) {
        this.registry = options.registry;
        this.externalEvaluator = options.externalEvaluator;
    }

    public async authorize(
        context: ExecutionContext | null | undefined,
        requirement: SecurityRequirement,
        source: RequirementSource = 'declarative'
    ): Promise<AuthorizationVerdict> {
        if (
            this.externalEvaluator &&
            source !== 'default-deny' &&
            !requirement.allowAnonymous &&
            hasIdentity(context)
        ) {
            logger.debug({ identityId: context.identityId, source }, 'Delegating authorization to external evaluator');
            return this.externalEvaluator.evaluateExternalPolicy(context, requirement);
        }

        const verdict = evaluateRequirement(context, requirement, source);
        logger.debug({
            identityId: context?.identityId ?? null,
            source: verdict.source,
            granted: verdict.granted,
            reason: verdict.granted ? null : verdict.reason
        }, 'Authorization evaluated');
        return verdict;
    }

    /**
     * Resolves the effective requirement (registry before declarative) and
     * evaluates it.
     */
    public async authorizeOperation(
        context: ExecutionContext | null | undefined,
        operation: OperationDescriptor
    ): Promise<AuthorizationVerdict> {
        const { requirement, source } = resolveRequirement(this.registry, operation);
        return this.authorize(context, requirement, source);
    }

    public hasRole(context: ExecutionContext, role: string): boolean {
        return context.roles.has(role);
    }

    public hasPermission(context: ExecutionContext, permission: string): boolean {
        return context.permissions.has(permission);
    }
}
