/**
 * Unit Tests: Requirement precedence
 *
 * @see libs/security/precedence.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    ANONYMOUS_REQUIREMENT,
    DENY_ALL_REQUIREMENT,
    EndpointSecurityRegistry,
    REQUIREMENT_FALLBACK_ORDER,
    defineRequirement,
    resolveRequirement
} from '../../libs/security/index.js';

const DECLARED = defineRequirement({ roles: ['owner'] });
const REGISTERED = defineRequirement({ roles: ['auditor'] });

describe('resolveRequirement', () => {
    it('should expose the fallback order', () => {
        assert.deepStrictEqual([...REQUIREMENT_FALLBACK_ORDER], ['registry', 'declarative', 'default-deny']);
    });

    it('should prefer the registry entry over the declarative requirement', () => {
        const registry = new EndpointSecurityRegistry();
        registry.register('/contracts/{contractId}', 'GET', REGISTERED);

        const resolved = resolveRequirement(registry, { path: '/contracts/{contractId}', verb: 'get', requirement: DECLARED });

        assert.strictEqual(resolved.requirement, REGISTERED);
        assert.strictEqual(resolved.source, 'registry');
    });

    it('should fall back to the declarative requirement', () => {
        const resolved = resolveRequirement(new EndpointSecurityRegistry(), { path: '/x', verb: 'GET', requirement: DECLARED });

        assert.strictEqual(resolved.requirement, DECLARED);
        assert.strictEqual(resolved.source, 'declarative');
    });

    it('should allow anonymous operations without any requirement', () => {
        const resolved = resolveRequirement(new EndpointSecurityRegistry(), { path: '/x', verb: 'GET', allowAnonymous: true });

        assert.strictEqual(resolved.requirement, ANONYMOUS_REQUIREMENT);
        assert.strictEqual(resolved.source, 'declarative');
    });

    it('should deny by default', () => {
        const resolved = resolveRequirement(new EndpointSecurityRegistry(), { path: '/x', verb: 'GET' });

        assert.strictEqual(resolved.requirement, DENY_ALL_REQUIREMENT);
        assert.strictEqual(resolved.source, 'default-deny');
    });
});
