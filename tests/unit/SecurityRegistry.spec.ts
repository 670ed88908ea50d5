/**
 * Unit Tests: Endpoint Security Registry
 *
 * @see libs/security/registry.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { EndpointSecurityRegistry, defineRequirement, registryKey } from '../../libs/security/index.js';

const OWNER_ONLY = defineRequirement({ roles: ['owner'] });
const VIEWER = defineRequirement({ roles: ['account_viewer'] });

describe('EndpointSecurityRegistry', () => {
    let registry: EndpointSecurityRegistry;

    beforeEach(() => {
        registry = new EndpointSecurityRegistry();
    });

    it('should return the registered requirement for the exact key', () => {
        registry.register('/contracts/{contractId}', 'GET', OWNER_ONLY);

        assert.strictEqual(registry.get('/contracts/{contractId}', 'GET'), OWNER_ONLY);
        assert.strictEqual(registry.get('/contracts/{contractId}', 'POST'), null);
        assert.strictEqual(registry.get('/contracts/C1', 'GET'), null);
    });

    it('should normalize verbs', () => {
        registry.register('/contracts', ' post ', OWNER_ONLY);

        assert.strictEqual(registry.isRegistered('/contracts', 'POST'), true);
        assert.strictEqual(registry.get('/contracts', 'Post'), OWNER_ONLY);
        assert.strictEqual(registryKey('/contracts', 'post'), 'POST /contracts');
    });

    it('should replace an entry registered twice', () => {
        registry.register('/contracts', 'GET', OWNER_ONLY);
        registry.register('/contracts', 'GET', VIEWER);

        assert.strictEqual(registry.get('/contracts', 'GET'), VIEWER);
        assert.strictEqual(registry.size, 1);
    });

    it('should report whether unregister removed anything', () => {
        registry.register('/contracts', 'GET', OWNER_ONLY);

        assert.strictEqual(registry.unregister('/contracts', 'get'), true);
        assert.strictEqual(registry.unregister('/contracts', 'GET'), false);
        assert.strictEqual(registry.isRegistered('/contracts', 'GET'), false);
    });

    it('should hand out snapshots from listAll', () => {
        registry.register('/contracts', 'GET', OWNER_ONLY);
        const snapshot = registry.listAll();

        registry.register('/products', 'GET', VIEWER);
        registry.clear();

        assert.deepStrictEqual([...snapshot.keys()], ['GET /contracts']);
        assert.strictEqual(snapshot.get('GET /contracts')?.requirement, OWNER_ONLY);
        assert.strictEqual(registry.size, 0);
    });

    it('should reject empty paths and verbs', () => {
        assert.throws(() => registry.register('', 'GET', OWNER_ONLY), /path must not be empty/);
        assert.throws(() => registry.register('/contracts', '  ', OWNER_ONLY), /verb must not be empty/);
    });
});
