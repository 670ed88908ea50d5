/**
 * Postgres-backed tenant directory.
 * Parameterized statements with explicit column lists.
 */

import type { Queryable } from '../db/index.js';
import type { TenantDirectory } from './tenantDirectory.js';

interface IdentityTenantRow {
    tenant_id: string;
}

export class PostgresTenantDirectory implements TenantDirectory {
    constructor(private readonly db: Queryable) { }

    /**
     * Returns null if the identity has no active tenant binding.
     */
    public async lookupTenant(identityId: string): Promise<string | null> {
        const result = await this.db.query<IdentityTenantRow>(
            `SELECT
                tenant_id
            FROM identity_tenants
            WHERE identity_id = $1 AND is_active = true
            ORDER BY created_at ASC
            LIMIT 1`,
            [identityId]
        );

        return result.rows[0]?.tenant_id ?? null;
    }
}
