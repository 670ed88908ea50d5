/**
 * Postgres-backed session source.
 * One row per (identity, tenant) holding the membership snapshot as jsonb.
 */

import type { Queryable } from '../db/index.js';
import { validate } from '../validation/zod-middleware.js';
import { SessionRecordSchema } from '../validation/sessionSchema.js';
import type { SessionRecord, SessionSource } from './session.js';

interface SessionSnapshotRow {
    identity_id: string;
    tenant_id: string;
    memberships: unknown;
}

export class PostgresSessionSource implements SessionSource {
    constructor(private readonly db: Queryable) { }

    public async lookupSession(identityId: string, tenantId: string): Promise<SessionRecord | null> {
        const result = await this.db.query<SessionSnapshotRow>(
            `SELECT
                identity_id,
                tenant_id,
                memberships
            FROM session_snapshots
            WHERE identity_id = $1 AND tenant_id = $2
            LIMIT 1`,
            [identityId, tenantId]
        );

        const row = result.rows[0];
        if (!row) {
            return null;
        }

        return mapRowToSession(row);
    }
}

function mapRowToSession(row: SessionSnapshotRow): SessionRecord {
    return Object.freeze(validate(SessionRecordSchema, {
        identityId: row.identity_id,
        tenantId: row.tenant_id,
        memberships: row.memberships
    }, `SessionSnapshot:${row.identity_id}`));
}
