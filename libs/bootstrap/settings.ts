import { z } from 'zod';
import { validate } from '../validation/zod-middleware.js';
import type { Environment } from './config-guard.js';

const CoreEnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),

    IDENTITY_HEADER: z.string().min(1).default('x-party-id'),
    TENANT_HEADER: z.string().min(1).optional(),
    TRUSTED_GATEWAY: z.enum(['true', 'false']).default('false'),

    TOKEN_SECRET: z.string().min(32).optional(),
    TOKEN_ISSUER: z.string().min(1).optional(),
    TOKEN_AUDIENCE: z.string().min(1).optional(),

    CONFIG_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
    CONFIG_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(0),

    SECURITY_RULES_PATH: z.string().min(1),

    DB_HOST: z.string().min(1),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USER: z.string().min(1),
    DB_PASSWORD: z.string().min(1),
    DB_NAME: z.string().min(1),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_CA_CERT: z.string().min(1).optional()
});

export interface DatabaseSettings {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    poolMax: number;
    caCert: string | null;
}

export interface TokenSettings {
    secret: string;
    issuer: string | null;
    audience: string | null;
}

export interface CoreSettings {
    environment: 'development' | 'test' | 'staging' | 'production';
    port: number;
    identityHeader: string;
    /** Only honoured behind a trusted gateway. */
    tenantHeader: string | null;
    token: TokenSettings | null;
    configCache: { maxEntries: number; ttlMs: number | null };
    securityRulesPath: string;
    database: DatabaseSettings;
}

export function loadCoreSettings(env: Environment = process.env): CoreSettings {
    const parsed = validate(CoreEnvSchema, env, 'CoreSettings');
    const trustedGateway = parsed.TRUSTED_GATEWAY === 'true';

    return Object.freeze({
        environment: parsed.NODE_ENV,
        port: parsed.PORT,
        identityHeader: parsed.IDENTITY_HEADER.toLowerCase(),
        tenantHeader: trustedGateway && parsed.TENANT_HEADER ? parsed.TENANT_HEADER.toLowerCase() : null,
        token: parsed.TOKEN_SECRET
            ? {
                secret: parsed.TOKEN_SECRET,
                issuer: parsed.TOKEN_ISSUER ?? null,
                audience: parsed.TOKEN_AUDIENCE ?? null
            }
            : null,
        configCache: {
            maxEntries: parsed.CONFIG_CACHE_MAX_ENTRIES,
            ttlMs: parsed.CONFIG_CACHE_TTL_MS > 0 ? parsed.CONFIG_CACHE_TTL_MS : null
        },
        securityRulesPath: parsed.SECURITY_RULES_PATH,
        database: {
            host: parsed.DB_HOST,
            port: parsed.DB_PORT,
            user: parsed.DB_USER,
            password: parsed.DB_PASSWORD,
            database: parsed.DB_NAME,
            poolMax: parsed.DB_POOL_MAX,
            caCert: parsed.DB_CA_CERT ?? null
        }
    });
}
