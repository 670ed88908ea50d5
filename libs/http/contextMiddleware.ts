import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RequestContext } from '../context/requestContext.js';
import type { ApplicationExecutionContext, ExecutionScopeService } from '../resolver/index.js';

const executions = new WeakMap<Request, ApplicationExecutionContext>();

/**
 * Execution context established for this request, if any.
 */
export function findExecution(req: Request): ApplicationExecutionContext | null {
    return executions.get(req) ?? null;
}

function routeParam(req: Request, name: string): string | null {
    const value = req.params[name];
    return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * Resolves the execution context (and tenant configuration) for the route
 * and runs the rest of the chain inside RequestContext.
 *
 * Tier follows the route params: productId → product level,
 * contractId → contract level, neither → party level.
 */
export function createContextMiddleware(scopes: ExecutionScopeService): RequestHandler {
    return async (req: Request, _res: Response, next: NextFunction) => {
        try {
            const contractId = routeParam(req, 'contractId');
            const productId = routeParam(req, 'productId');

            const execution = productId
                ? await scopes.resolveProductContext(req, contractId, productId)
                : contractId
                    ? await scopes.resolveContractContext(req, contractId)
                    : await scopes.resolvePartyContext(req);

            executions.set(req, execution);
            RequestContext.run(execution.context, () => next());
        } catch (error) {
            next(error);
        }
    };
}
