/**
 * Unit Tests: Configuration guard and core settings
 *
 * @see libs/bootstrap/config-guard.ts
 * @see libs/bootstrap/settings.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard } from '../../libs/bootstrap/config-guard.js';
import { DB_CONFIG_GUARDS } from '../../libs/bootstrap/config/db-config.js';
import { CONTEXT_CONFIG_GUARDS } from '../../libs/bootstrap/config/context-config.js';
import { loadCoreSettings } from '../../libs/bootstrap/settings.js';

const BASE_ENV = {
    DB_HOST: 'localhost',
    DB_PORT: '5432',
    DB_USER: 'test',
    DB_PASSWORD: 'test',
    DB_NAME: 'test',
    SECURITY_RULES_PATH: 'config/security-rules.json'
};

describe('ConfigGuard', () => {
    it('should pass a complete development environment', () => {
        assert.deepStrictEqual(ConfigGuard.collectViolations([...DB_CONFIG_GUARDS, ...CONTEXT_CONFIG_GUARDS], BASE_ENV), []);
    });

    it('should report every missing variable', () => {
        const violations = ConfigGuard.collectViolations(DB_CONFIG_GUARDS, { DB_HOST: 'localhost', DB_PORT: ' ' });

        assert.deepStrictEqual(violations, [
            'FATAL CONFIG: Required env var DB_PORT is missing',
            'FATAL CONFIG: Required env var DB_USER is missing',
            'FATAL CONFIG: Required env var DB_PASSWORD is missing',
            'FATAL CONFIG: Required env var DB_NAME is missing'
        ]);
    });

    it('should mask sensitive values when describing required variables', () => {
        const described = ConfigGuard.describeRequired(DB_CONFIG_GUARDS, { ...BASE_ENV, DB_NAME: ' ' });

        assert.deepStrictEqual(described, {
            DB_HOST: 'localhost',
            DB_PORT: '5432',
            DB_USER: 'test',
            DB_PASSWORD: '[REDACTED]',
            DB_NAME: null
        });
    });

    it('should report a missing sensitive variable as missing', () => {
        assert.deepStrictEqual(ConfigGuard.describeRequired(DB_CONFIG_GUARDS, {}).DB_PASSWORD, null);
    });

    it('should require a CA certificate in production', () => {
        const violations = ConfigGuard.collectViolations(DB_CONFIG_GUARDS, { ...BASE_ENV, NODE_ENV: 'production' });

        assert.deepStrictEqual(violations, ['FATAL CONFIG: DB_CA_CERT is required in production/staging']);
    });

    it('should forbid a tenant header outside a trusted gateway', () => {
        const violations = ConfigGuard.collectViolations(CONTEXT_CONFIG_GUARDS, { ...BASE_ENV, TENANT_HEADER: 'x-tenant-id' });

        assert.deepStrictEqual(violations, [
            'FATAL CONFIG: TENANT_HEADER may only be set when TRUSTED_GATEWAY=true (Rule: TenantHeaderWithoutGateway)'
        ]);
    });

    it('should turn throwing checks into violations', () => {
        const violations = ConfigGuard.collectViolations([
            { type: 'assert', check: () => { throw new Error('boom'); }, message: 'unused' }
        ], {});

        assert.deepStrictEqual(violations, ['Check failed for rule: boom']);
    });
});

describe('loadCoreSettings', () => {
    it('should apply defaults', () => {
        const settings = loadCoreSettings(BASE_ENV);

        assert.strictEqual(settings.environment, 'development');
        assert.strictEqual(settings.port, 8080);
        assert.strictEqual(settings.identityHeader, 'x-party-id');
        assert.strictEqual(settings.tenantHeader, null);
        assert.strictEqual(settings.token, null);
        assert.deepStrictEqual(settings.configCache, { maxEntries: 1000, ttlMs: null });
        assert.deepStrictEqual(settings.database, {
            host: 'localhost',
            port: 5432,
            user: 'test',
            password: 'test',
            database: 'test',
            poolMax: 10,
            caCert: null
        });
    });

    it('should honour the tenant header only behind a trusted gateway', () => {
        assert.strictEqual(loadCoreSettings({ ...BASE_ENV, TENANT_HEADER: 'X-Tenant-Id' }).tenantHeader, null);
        assert.strictEqual(
            loadCoreSettings({ ...BASE_ENV, TENANT_HEADER: 'X-Tenant-Id', TRUSTED_GATEWAY: 'true' }).tenantHeader,
            'x-tenant-id'
        );
    });

    it('should build token settings from the secret', () => {
        const settings = loadCoreSettings({
            ...BASE_ENV,
            TOKEN_SECRET: 'test-secret-for-settings-0000000000',
            TOKEN_ISSUER: 'test-issuer',
            CONFIG_CACHE_TTL_MS: '60000'
        });

        assert.deepStrictEqual(settings.token, {
            secret: 'test-secret-for-settings-0000000000',
            issuer: 'test-issuer',
            audience: null
        });
        assert.strictEqual(settings.configCache.ttlMs, 60000);
    });

    it('should reject malformed values', () => {
        assert.throws(() => loadCoreSettings({ ...BASE_ENV, PORT: 'eighty' }), { name: 'ValidationError' });
        assert.throws(() => loadCoreSettings({ ...BASE_ENV, TOKEN_SECRET: 'short' }), { name: 'ValidationError' });
    });
});
