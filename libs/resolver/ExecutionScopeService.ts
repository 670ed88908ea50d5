import type { ConfigResolver, TenantConfiguration } from '../config/index.js';
import type { ExecutionContext } from '../context/executionContext.js';
import { ResolutionError } from '../errors/ResolutionError.js';
import type { ContextResolver } from './ContextResolver.js';
import type { InboundRequest } from './strategy.js';

/** Context plus the tenant configuration it runs under. */
export interface ApplicationExecutionContext {
    readonly context: ExecutionContext;
    readonly config: TenantConfiguration;
}

function requireScopeId(value: string | null | undefined, name: string): string {
    if (!value || value.trim() === '') {
        throw new ResolutionError('MissingScope', `${name} is required`);
    }
    return value;
}

/**
 * Party, contract and product tiers over the context and config resolvers.
 * Required scope ids are checked before anything is looked up.
 */
export class ExecutionScopeService {
    constructor(
        private readonly contextResolver: ContextResolver,
        private readonly configResolver: ConfigResolver
    ) { }

    public async resolveExecutionContext(
        request: InboundRequest,
        contractId?: string | null,
        productId?: string | null
    ): Promise<ApplicationExecutionContext> {
        const context = await this.contextResolver.resolveContext(request, contractId, productId);
        const config = await this.configResolver.resolveConfig(context.tenantId);
        return Object.freeze({ context, config });
    }

    public async resolvePartyContext(request: InboundRequest): Promise<ApplicationExecutionContext> {
        return this.resolveExecutionContext(request, null, null);
    }

    public async resolveContractContext(
        request: InboundRequest,
        contractId: string | null | undefined
    ): Promise<ApplicationExecutionContext> {
        const contract = requireScopeId(contractId, 'contractId');
        return this.resolveExecutionContext(request, contract, null);
    }

    public async resolveProductContext(
        request: InboundRequest,
        contractId: string | null | undefined,
        productId: string | null | undefined
    ): Promise<ApplicationExecutionContext> {
        const contract = requireScopeId(contractId, 'contractId');
        const product = requireScopeId(productId, 'productId');
        return this.resolveExecutionContext(request, contract, product);
    }
}
