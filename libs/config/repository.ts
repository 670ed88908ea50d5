/**
 * Postgres-backed tenant configuration source.
 * Parameterized statements with explicit column lists.
 */

import type { Queryable } from '../db/index.js';
import { validate } from '../validation/zod-middleware.js';
import { TenantConfigurationSchema } from '../validation/tenantConfigSchema.js';
import { createTenantConfiguration, type TenantConfigSource, type TenantConfiguration } from './tenantConfig.js';

interface TenantConfigurationRow {
    tenant_id: string;
    display_name: string | null;
    providers: unknown;
    feature_flags: unknown;
    settings: unknown;
    is_active: boolean;
}

export class PostgresTenantConfigSource implements TenantConfigSource {
    constructor(private readonly db: Queryable) { }

    /**
     * Returns null if the tenant has no configuration row.
     */
    public async fetchTenantConfig(tenantId: string): Promise<TenantConfiguration | null> {
        const result = await this.db.query<TenantConfigurationRow>(
            `SELECT
                tenant_id,
                display_name,
                providers,
                feature_flags,
                settings,
                is_active
            FROM tenant_configurations
            WHERE tenant_id = $1
            LIMIT 1`,
            [tenantId]
        );

        const row = result.rows[0];
        if (!row) {
            return null;
        }

        return mapRowToTenantConfiguration(row);
    }
}

function mapRowToTenantConfiguration(row: TenantConfigurationRow): TenantConfiguration {
    const parsed = validate(TenantConfigurationSchema, {
        tenantId: row.tenant_id,
        displayName: row.display_name ?? '',
        providers: row.providers ?? {},
        featureFlags: row.feature_flags ?? {},
        settings: row.settings ?? {},
        active: row.is_active
    }, `TenantConfiguration:${row.tenant_id}`);

    return createTenantConfiguration(parsed);
}
