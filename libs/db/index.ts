import pg from 'pg';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import type { DatabaseSettings } from '../bootstrap/settings.js';

const { Pool } = pg;

export type Queryable = {
    query<T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
};

/**
 * Connection pool for the platform tables (tenant directory, tenant
 * configuration). TLS is mandatory outside development and test.
 */
export function createPool(settings: DatabaseSettings, environment: string): pg.Pool {
    const isProtectedEnv = environment === 'production' || environment === 'staging';
    if (isProtectedEnv && !settings.caCert) {
        throw new Error("CRITICAL: Missing DB_CA_CERT in protected environment (production/staging). Database connection aborted.");
    }

    const pool = new Pool({
        host: settings.host,
        port: settings.port,
        user: settings.user,
        password: settings.password,
        database: settings.database,
        max: settings.poolMax,
        ssl: settings.caCert
            ? { rejectUnauthorized: true, ca: settings.caCert }
            : false
    });

    pool.on('error', (error) => {
        logger.error({ error: error.message }, '[DB] Idle client error');
    });

    return pool;
}

/**
 * Query facade that never lets raw driver errors escape.
 */
export function createDb(pool: pg.Pool): Queryable {
    return {
        query: async <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) => {
            try {
                return await pool.query<T>(text, params);
            } catch (error) {
                throw ErrorSanitizer.sanitize(error, 'DatabaseLayer:QueryFailure');
            }
        }
    };
}
