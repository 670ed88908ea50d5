/**
 * Unit Tests: Token Claim Strategy
 *
 * Identity and tenant from verified bearer token claims.
 *
 * @see libs/resolver/strategies/tokenClaimStrategy.ts
 */

import { describe, it, beforeEach, mock, type Mock } from 'node:test';
import assert from 'node:assert';
import { SignJWT, type JWTPayload } from 'jose';
import { TokenClaimStrategy, type InboundRequest } from '../../libs/resolver/index.js';
import type { TenantDirectory } from '../../libs/tenant/tenantDirectory.js';

const SECRET = 'test-secret-for-token-claims-000000';
const OTHER_SECRET = 'test-secret-that-does-not-match-00';

async function sign(claims: JWTPayload, secret = SECRET, issuer = 'test-issuer'): Promise<string> {
    return new SignJWT(claims)
        .setProtectedHeader({ alg: 'HS256' })
        .setIssuedAt()
        .setIssuer(issuer)
        .setExpirationTime('5m')
        .sign(new TextEncoder().encode(secret));
}

function bearer(token: string): InboundRequest {
    return { headers: { authorization: `Bearer ${token}` } };
}

describe('TokenClaimStrategy', () => {
    let lookupTenant: Mock<TenantDirectory['lookupTenant']>;
    let strategy: TokenClaimStrategy;

    beforeEach(() => {
        lookupTenant = mock.fn<TenantDirectory['lookupTenant']>(async () => 'tenant-from-directory');
        strategy = new TokenClaimStrategy({
            secret: SECRET,
            issuer: 'test-issuer',
            tenantDirectory: { lookupTenant }
        });
    });

    it('should support only bearer requests and outrank the header strategy by default', () => {
        assert.strictEqual(strategy.supports({ headers: { authorization: 'Bearer abc' } }), true);
        assert.strictEqual(strategy.supports({ headers: { authorization: 'Basic abc' } }), false);
        assert.strictEqual(strategy.supports({ headers: {} }), false);
        assert.strictEqual(strategy.priority, 10);
    });

    it('should read identity from sub and tenant from the tenantId claim', async () => {
        const req = bearer(await sign({ sub: 'party-1', tenantId: 'tenant-1' }));

        assert.strictEqual(await strategy.resolveIdentity(req), 'party-1');
        assert.strictEqual(await strategy.resolveTenant(req, 'party-1'), 'tenant-1');
        assert.strictEqual(lookupTenant.mock.calls.length, 0);
    });

    it('should fall back to partyId and the tenant directory', async () => {
        const req = bearer(await sign({ partyId: 'party-2' }));

        assert.strictEqual(await strategy.resolveIdentity(req), 'party-2');
        assert.strictEqual(await strategy.resolveTenant(req, 'party-2'), 'tenant-from-directory');
        assert.deepStrictEqual(lookupTenant.mock.calls[0]?.arguments, ['party-2']);
    });

    it('should yield no identity for a token signed with another key', async () => {
        const req = bearer(await sign({ sub: 'party-1' }, OTHER_SECRET));

        assert.strictEqual(await strategy.resolveIdentity(req), null);
    });

    it('should yield no identity for a token from another issuer', async () => {
        const req = bearer(await sign({ sub: 'party-1' }, SECRET, 'someone-else'));

        assert.strictEqual(await strategy.resolveIdentity(req), null);
    });
});
