import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RequestContext } from '../context/requestContext.js';
import { getContextLogger, logger } from '../logging/logger.js';
import type { EndpointSecurityRegistry } from '../security/registry.js';
import type { SecurityDecisionEngine } from '../security/decisionEngine.js';
import { describeRequirement, type AuthorizationVerdict, type SecurityRequirement } from '../security/requirement.js';
import { findRegisteredPattern, fromExpressPath } from './pathTemplate.js';

export interface SecuredOperation {
    /**
     * Template the route is mounted under. When omitted it is taken from the
     * express route that matched, then from the registry; a request that maps
     * to no template is denied by default.
     */
    path?: string;
    /** Declarative requirement attached to the route */
    requirement?: SecurityRequirement | null;
    allowAnonymous?: boolean;
}

function matchedRouteTemplate(req: Request): string | null {
    const route: unknown = req.route;
    if (typeof route !== 'object' || route === null || !('path' in route)) return null;
    return typeof route.path === 'string' ? `${req.baseUrl}${fromExpressPath(route.path)}` : null;
}

function denialStatus(verdict: Extract<AuthorizationVerdict, { granted: false }>): number {
    return verdict.reason === 'Unauthenticated' ? 401 : 403;
}

/**
 * Applies precedence (registry, then declarative, then default-deny) and
 * the decision engine to the request. Denials end the request with a JSON
 * body carrying the reason.
 */
export function createSecurityMiddleware(
    engine: SecurityDecisionEngine,
    registry: EndpointSecurityRegistry,
    operation: SecuredOperation = {}
): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            const requestPath = `${req.baseUrl}${req.path}`;
            const template = operation.path
                ?? matchedRouteTemplate(req)
                ?? findRegisteredPattern(registry.listAll().values(), req.method, requestPath);
            const path = template ?? requestPath;

            const context = RequestContext.find();
            const verdict = await engine.authorizeOperation(context, template === null
                ? { path, verb: req.method, requirement: null, allowAnonymous: false }
                : {
                    path,
                    verb: req.method,
                    requirement: operation.requirement ?? null,
                    allowAnonymous: operation.allowAnonymous ?? false
                });

            if (verdict.granted) {
                next();
                return;
            }

            const log = context ? getContextLogger(context) : logger;
            log.warn({
                path,
                verb: req.method,
                reason: verdict.reason,
                source: verdict.source,
                requirement: describeRequirement(verdict.requirement)
            }, 'Authorization denied');

            res.status(denialStatus(verdict)).json({
                error: verdict.reason,
                ...(verdict.detail ? { detail: verdict.detail } : {})
            });
        } catch (error) {
            next(error);
        }
    };
}
