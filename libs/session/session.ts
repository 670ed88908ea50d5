/**
 * Session snapshot model.
 *
 * Supplied per (identity, tenant) by the session source and treated as a
 * read-only snapshot for the duration of one resolution.
 */

/** One unit of permission under a role: action × resource. */
export interface ActionScope {
    readonly actionType?: string | null;
    readonly resourceType?: string | null;
    readonly active: boolean;
}

export interface RoleGrant {
    /** e.g. "owner", "account_viewer" */
    readonly roleCode?: string | null;
    readonly active: boolean;
    readonly scopes?: readonly ActionScope[] | null;
}

export interface ProductReference {
    readonly productId: string;
}

export interface ContractMembership {
    readonly contractId: string;
    readonly active: boolean;
    readonly product?: ProductReference | null;
    readonly roleGrant?: RoleGrant | null;
}

export interface SessionRecord {
    readonly identityId?: string;
    readonly tenantId?: string;
    readonly memberships?: readonly ContractMembership[] | null;
}

/**
 * Session source collaborator (one logical call per resolution).
 * Returns null when no session exists for the pair.
 */
export interface SessionSource {
    lookupSession(identityId: string, tenantId: string): Promise<SessionRecord | null>;
}
