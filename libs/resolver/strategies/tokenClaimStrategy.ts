import { jwtVerify, type JWTPayload } from 'jose';
import { logger } from '../../logging/logger.js';
import type { TenantDirectory } from '../../tenant/tenantDirectory.js';
import { readHeader, type ContextStrategy, type InboundRequest } from '../strategy.js';

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

export interface TokenClaimStrategyOptions {
    /** HS256 shared secret */
    secret: string;
    issuer?: string | null;
    audience?: string | null;
    /** Used when the token carries no tenant claim. */
    tenantDirectory: TenantDirectory;
    priority?: number;
}

function bearerToken(request: InboundRequest): string | null {
    const header = readHeader(request, 'authorization');
    const match = header ? BEARER_PREFIX.exec(header) : null;
    return match?.[1] ?? null;
}

function stringClaim(payload: JWTPayload, name: string): string | null {
    const value = payload[name];
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : null;
}

/**
 * Identity and tenant from the claims of a verified bearer token.
 * Claims: sub (or partyId) for the identity, tenantId for the tenant.
 */
export class TokenClaimStrategy implements ContextStrategy {
    public readonly name = 'token-claim';
    public readonly priority: number;

    private readonly key: Uint8Array;
    private readonly issuer: string | null;
    private readonly audience: string | null;
    private readonly tenantDirectory: TenantDirectory;
    // One verification per request, shared by both resolution steps.
    private readonly verified = new WeakMap<InboundRequest, Promise<JWTPayload | null>>();

    constructor(options: TokenClaimStrategyOptions) {
        this.key = new TextEncoder().encode(options.secret);
        this.issuer = options.issuer ?? null;
        this.audience = options.audience ?? null;
        this.tenantDirectory = options.tenantDirectory;
        this.priority = options.priority ?? 10;
    }

    public supports(request: InboundRequest): boolean {
        return bearerToken(request) !== null;
    }

    public async resolveIdentity(request: InboundRequest): Promise<string | null> {
        const payload = await this.claims(request);
        if (!payload) return null;
        return stringClaim(payload, 'sub') ?? stringClaim(payload, 'partyId');
    }

    public async resolveTenant(request: InboundRequest, identityId: string): Promise<string | null> {
        const payload = await this.claims(request);
        const claimed = payload ? stringClaim(payload, 'tenantId') : null;
        if (claimed) {
            return claimed;
        }
        return this.tenantDirectory.lookupTenant(identityId);
    }

    private claims(request: InboundRequest): Promise<JWTPayload | null> {
        let pending = this.verified.get(request);
        if (!pending) {
            pending = this.verify(request);
            this.verified.set(request, pending);
        }
        return pending;
    }

    private async verify(request: InboundRequest): Promise<JWTPayload | null> {
        const token = bearerToken(request);
        if (!token) return null;

        try {
            const { payload } = await jwtVerify(token, this.key, {
                algorithms: ['HS256'],
                ...(this.issuer ? { issuer: this.issuer } : {}),
                ...(this.audience ? { audience: this.audience } : {})
            });
            return payload;
        } catch (error) {
            logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Bearer token rejected');
            return null;
        }
    }
}
