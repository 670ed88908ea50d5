/**
 * Lattice Execution Context
 *
 * Hierarchical scope of one inbound operation:
 * identity → tenant → contract → product.
 *
 * Instances are frozen, down to the role and permission sets. Enrichment
 * produces a new instance; roles and permissions always belong to the
 * contract/product pair carried alongside.
 */

export interface ExecutionContext {
    /** Authenticated caller (party) */
    readonly identityId: string;
    /** Tenant boundary the caller operates under */
    readonly tenantId: string;
    /** Contract scope, absent for party-level operations */
    readonly contractId?: string;
    /** Product scope, only meaningful alongside a contract */
    readonly productId?: string;
    readonly roles: ReadonlySet<string>;
    readonly permissions: ReadonlySet<string>;
    readonly attributes: Readonly<Record<string, unknown>>;
}

export interface ContextInput {
    identityId: string;
    tenantId: string;
    contractId?: string | null;
    productId?: string | null;
    roles?: Iterable<string>;
    permissions?: Iterable<string>;
    attributes?: Record<string, unknown>;
}

export interface ContextGrants {
    roles: Iterable<string>;
    permissions: Iterable<string>;
}

/** Scope level implied by the ids present on a context. */
export type ContextScope = 'party' | 'contract' | 'product';

function rejectMutation(): never {
    throw new TypeError('Execution context grants are read-only');
}

function readOnlySet(values: Iterable<string>): ReadonlySet<string> {
    const set = new Set(values);
    for (const method of ['add', 'delete', 'clear'] as const) {
        Object.defineProperty(set, method, { value: rejectMutation, enumerable: false });
    }
    return Object.freeze(set);
}

export function createExecutionContext(input: ContextInput): ExecutionContext {
    return Object.freeze({
        identityId: input.identityId,
        tenantId: input.tenantId,
        ...(input.contractId ? { contractId: input.contractId } : {}),
        ...(input.productId ? { productId: input.productId } : {}),
        roles: readOnlySet(input.roles ?? []),
        permissions: readOnlySet(input.permissions ?? []),
        attributes: Object.freeze({ ...(input.attributes ?? {}) })
    });
}

/**
 * Returns a new context carrying the given grants. The scope ids of the base
 * context are kept as-is; the grants replace any previous ones.
 */
export function enrichContext(base: ExecutionContext, grants: ContextGrants): ExecutionContext {
    return createExecutionContext({
        identityId: base.identityId,
        tenantId: base.tenantId,
        contractId: base.contractId,
        productId: base.productId,
        roles: grants.roles,
        permissions: grants.permissions,
        attributes: base.attributes
    });
}

export function withAttributes(base: ExecutionContext, attributes: Record<string, unknown>): ExecutionContext {
    return createExecutionContext({
        ...base,
        attributes: { ...base.attributes, ...attributes }
    });
}

export function scopeOf(context: ExecutionContext): ContextScope {
    if (context.contractId && context.productId) return 'product';
    if (context.contractId) return 'contract';
    return 'party';
}

/**
 * Plain, JSON-friendly view of a context (sets as sorted arrays).
 */
export function describeContext(context: ExecutionContext) {
    return {
        identityId: context.identityId,
        tenantId: context.tenantId,
        contractId: context.contractId ?? null,
        productId: context.productId ?? null,
        scope: scopeOf(context),
        roles: [...context.roles].sort(),
        permissions: [...context.permissions].sort()
    };
}
