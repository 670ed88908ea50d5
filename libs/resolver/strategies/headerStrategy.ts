import { logger } from '../../logging/logger.js';
import type { TenantDirectory } from '../../tenant/tenantDirectory.js';
import { readHeader, type ContextStrategy, type InboundRequest } from '../strategy.js';

export interface HeaderStrategyOptions {
    /** Header set by the authenticating proxy, e.g. x-party-id */
    identityHeader: string;
    /**
     * Tenant header written by a trusted gateway. When null the tenant is
     * always looked up from the directory.
     */
    tenantHeader?: string | null;
    tenantDirectory: TenantDirectory;
    priority?: number;
}

/**
 * Reads the identity from a header injected by the authenticating proxy.
 */
export class HeaderContextStrategy implements ContextStrategy {
    public readonly name = 'header';
    public readonly priority: number;

    private readonly identityHeader: string;
    private readonly tenantHeader: string | null;
    private readonly tenantDirectory: TenantDirectory;

    constructor(options: HeaderStrategyOptions) {
        this.identityHeader = options.identityHeader.toLowerCase();
        this.tenantHeader = options.tenantHeader ? options.tenantHeader.toLowerCase() : null;
        this.tenantDirectory = options.tenantDirectory;
        this.priority = options.priority ?? 0;
    }

    public supports(request: InboundRequest): boolean {
        return readHeader(request, this.identityHeader) !== null;
    }

    public async resolveIdentity(request: InboundRequest): Promise<string | null> {
        return readHeader(request, this.identityHeader);
    }

    public async resolveTenant(request: InboundRequest, identityId: string): Promise<string | null> {
        if (this.tenantHeader) {
            const fromGateway = readHeader(request, this.tenantHeader);
            if (fromGateway) {
                return fromGateway;
            }
        }

        const tenantId = await this.tenantDirectory.lookupTenant(identityId);
        logger.debug({ identityId, found: tenantId !== null }, 'Tenant looked up from directory');
        return tenantId;
    }
}
