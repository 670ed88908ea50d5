/**
 * Context Resolver
 *
 * 1. identity from the selected strategy (trusted attribute)
 * 2. tenant from the same strategy (trusted attribute or directory lookup)
 * 3. contract/product exactly as the caller's route supplies them
 * 4. session snapshot for (identity, tenant) → roles and permissions
 * 5. frozen ExecutionContext
 *
 * Any failure aborts; nothing partial is returned and nothing is cached.
 */

import { createExecutionContext, type ExecutionContext } from '../context/executionContext.js';
import { ResolutionError } from '../errors/ResolutionError.js';
import { logger } from '../logging/logger.js';
import { extractPermissions, extractRoles, type SessionRecord, type SessionSource } from '../session/index.js';
import { SessionRecordSchema } from '../validation/sessionSchema.js';
import { validate, ValidationError } from '../validation/zod-middleware.js';
import { selectStrategy, type ContextStrategy, type InboundRequest } from './strategy.js';

export interface ContextResolverOptions {
    strategies?: ContextStrategy[];
    sessionSource: SessionSource;
}

export class ContextResolver {
    private readonly strategies: ContextStrategy[];
    private readonly sessionSource: SessionSource;

    constructor(options: ContextResolverOptions) {
        this.strategies = [...(options.strategies ?? [])];
        this.sessionSource = options.sessionSource;
    }

    public register(strategy: ContextStrategy): this {
        this.strategies.push(strategy);
        return this;
    }

    public async resolveContext(
        request: InboundRequest,
        explicitContractId?: string | null,
        explicitProductId?: string | null
    ): Promise<ExecutionContext> {
        const strategy = selectStrategy(this.strategies, request);
        if (!strategy) {
            throw new ResolutionError('MissingIdentity', 'No context strategy supports this request');
        }

        const identityId = await strategy.resolveIdentity(request);
        if (!identityId) {
            throw new ResolutionError('MissingIdentity', `Strategy ${strategy.name} found no identity`);
        }

        const tenantId = await strategy.resolveTenant(request, identityId);
        if (!tenantId) {
            throw new ResolutionError('MissingTenant', `No tenant found for identity ${identityId}`);
        }

        const contractId = explicitContractId || null;
        const productId = explicitProductId || null;

        const session = await this.loadSession(identityId, tenantId);

        const context = createExecutionContext({
            identityId,
            tenantId,
            contractId,
            productId,
            roles: extractRoles(session, contractId, productId),
            permissions: extractPermissions(session, contractId, productId),
            attributes: { resolvedBy: strategy.name }
        });

        logger.debug({
            identityId,
            tenantId,
            contractId,
            productId,
            strategy: strategy.name,
            roles: context.roles.size,
            permissions: context.permissions.size
        }, 'Execution context resolved');

        return context;
    }

    private async loadSession(identityId: string, tenantId: string): Promise<SessionRecord | null> {
        try {
            const raw = await this.sessionSource.lookupSession(identityId, tenantId);
            if (raw === null) {
                logger.debug({ identityId, tenantId }, 'No session snapshot; context carries no grants');
                return null;
            }
            return validate(SessionRecordSchema, raw, `SessionRecord:${identityId}`);
        } catch (error) {
            if (error instanceof ValidationError) {
                throw new ResolutionError('InvalidSession', `Session snapshot for ${identityId} is malformed`, { cause: error });
            }
            throw error;
        }
    }
}
