/**
 * Unit Tests: Execution Scope Service
 *
 * Party, contract and product tiers returning context plus configuration.
 *
 * @see libs/resolver/ExecutionScopeService.ts
 */

import { describe, it, beforeEach, mock, type Mock } from 'node:test';
import assert from 'node:assert';
import { ConfigResolver, createTenantConfiguration, type TenantConfigSource } from '../../libs/config/index.js';
import { ContextResolver, ExecutionScopeService, type ContextStrategy } from '../../libs/resolver/index.js';
import type { SessionSource } from '../../libs/session/index.js';

const strategy: ContextStrategy = {
    name: 'fake',
    priority: 0,
    supports: () => true,
    resolveIdentity: async () => 'party-1',
    resolveTenant: async () => 'tenant-1'
};

describe('ExecutionScopeService', () => {
    let lookupSession: Mock<SessionSource['lookupSession']>;
    let fetchTenantConfig: Mock<TenantConfigSource['fetchTenantConfig']>;
    let service: ExecutionScopeService;

    beforeEach(() => {
        lookupSession = mock.fn<SessionSource['lookupSession']>(async () => ({
            memberships: [{
                contractId: 'C1',
                active: true,
                product: { productId: 'P1' },
                roleGrant: { roleCode: 'owner', active: true }
            }]
        }));
        fetchTenantConfig = mock.fn<TenantConfigSource['fetchTenantConfig']>(async (tenantId) =>
            createTenantConfiguration({ tenantId, displayName: 'Tenant One' })
        );

        service = new ExecutionScopeService(
            new ContextResolver({ sessionSource: { lookupSession }, strategies: [strategy] }),
            new ConfigResolver({ fetchTenantConfig })
        );
    });

    it('should resolve context and tenant configuration together', async () => {
        const { context, config } = await service.resolveProductContext({ headers: {} }, 'C1', 'P1');

        assert.strictEqual(context.contractId, 'C1');
        assert.strictEqual(context.productId, 'P1');
        assert.deepStrictEqual(context.roles, new Set(['owner']));
        assert.strictEqual(config.tenantId, 'tenant-1');
        assert.strictEqual(config.displayName, 'Tenant One');
    });

    it('should resolve a party context without scope ids', async () => {
        const { context } = await service.resolvePartyContext({ headers: {} });

        assert.strictEqual(context.contractId, undefined);
        assert.strictEqual(context.productId, undefined);
    });

    it('should fail MissingScope before any lookup when the contract id is absent', async () => {
        await assert.rejects(service.resolveContractContext({ headers: {} }, null), {
            name: 'ResolutionError',
            code: 'MissingScope',
            message: 'contractId is required'
        });
        assert.strictEqual(lookupSession.mock.calls.length, 0);
        assert.strictEqual(fetchTenantConfig.mock.calls.length, 0);
    });

    it('should require both ids at product level', async () => {
        await assert.rejects(service.resolveProductContext({ headers: {} }, 'C1', ''), {
            code: 'MissingScope',
            message: 'productId is required'
        });
    });
});
