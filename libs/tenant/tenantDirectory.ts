/**
 * One-hop tenant lookup keyed by identity. The tenant is never taken from
 * anything the caller declares about itself.
 */
export interface TenantDirectory {
    lookupTenant(identityId: string): Promise<string | null>;
}
