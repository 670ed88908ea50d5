import type { GuardRule } from '../config-guard.js';

/**
 * Context resolution guards.
 * Header-carried tenants are only accepted behind a trusted gateway, and
 * bearer tokens are only verified against a real secret.
 */
export const CONTEXT_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'SECURITY_RULES_PATH' },

    {
        type: 'forbidIf',
        name: 'TenantHeaderWithoutGateway',
        when: (env) => !!env.TENANT_HEADER && env.TRUSTED_GATEWAY !== 'true',
        message: 'TENANT_HEADER may only be set when TRUSTED_GATEWAY=true',
    },

    {
        type: 'forbidIf',
        name: 'PlaceholderTokenSecret',
        when: (env) => env.NODE_ENV === 'production' && (env.TOKEN_SECRET ?? '').startsWith('test-'),
        message: 'Production cannot use a placeholder TOKEN_SECRET',
    },

    {
        type: 'assert',
        check: (env) => !env.TOKEN_SECRET || env.TOKEN_SECRET.length >= 32,
        message: 'TOKEN_SECRET must be at least 32 characters',
    }
];
