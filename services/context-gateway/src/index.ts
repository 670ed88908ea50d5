import express from "express";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { DB_CONFIG_GUARDS } from "../../../libs/bootstrap/config/db-config.js";
import { CONTEXT_CONFIG_GUARDS } from "../../../libs/bootstrap/config/context-config.js";
import { loadCoreSettings } from "../../../libs/bootstrap/settings.js";
import { ConfigResolver, PostgresTenantConfigSource, enabledProviders } from "../../../libs/config/index.js";
import { RequestContext } from "../../../libs/context/requestContext.js";
import { describeContext } from "../../../libs/context/executionContext.js";
import { createDb, createPool } from "../../../libs/db/index.js";
import {
    createContextMiddleware,
    createErrorHandler,
    createSecurityMiddleware,
    findExecution,
    toExpressPath
} from "../../../libs/http/index.js";
import { logger } from "../../../libs/logging/logger.js";
import {
    ContextResolver,
    ExecutionScopeService,
    HeaderContextStrategy,
    TokenClaimStrategy
} from "../../../libs/resolver/index.js";
import {
    EndpointSecurityRegistry,
    SecurityDecisionEngine,
    defineRequirement,
    loadSecurityRules
} from "../../../libs/security/index.js";
import { PostgresSessionSource } from "../../../libs/session/index.js";
import { PostgresTenantDirectory } from "../../../libs/tenant/repository.js";

const PARTY_PATH = '/me';
const CONTRACT_PATH = '/contracts/{contractId}';
const PRODUCT_PATH = '/contracts/{contractId}/products/{productId}';
const REFRESH_PATH = '/tenants/config/refresh';

async function main() {
    ConfigGuard.enforce([...DB_CONFIG_GUARDS, ...CONTEXT_CONFIG_GUARDS]);
    const settings = loadCoreSettings();

    const pool = createPool(settings.database, settings.environment);
    const db = createDb(pool);
    const tenantDirectory = new PostgresTenantDirectory(db);

    const contextResolver = new ContextResolver({ sessionSource: new PostgresSessionSource(db) });
    if (settings.token) {
        contextResolver.register(new TokenClaimStrategy({ ...settings.token, tenantDirectory }));
    }
    contextResolver.register(new HeaderContextStrategy({
        identityHeader: settings.identityHeader,
        tenantHeader: settings.tenantHeader,
        tenantDirectory
    }));

    const configResolver = new ConfigResolver(new PostgresTenantConfigSource(db), {
        maxEntries: settings.configCache.maxEntries,
        ...(settings.configCache.ttlMs ? { ttlMs: settings.configCache.ttlMs } : {})
    });
    const scopes = new ExecutionScopeService(contextResolver, configResolver);

    const registry = new EndpointSecurityRegistry();
    loadSecurityRules(registry, settings.securityRulesPath);
    const engine = new SecurityDecisionEngine({ registry });

    const resolveContext = createContextMiddleware(scopes);
    const app = express();

    app.get(
        toExpressPath(PARTY_PATH),
        resolveContext,
        createSecurityMiddleware(engine, registry, { path: PARTY_PATH, requirement: defineRequirement() }),
        (_req, res) => {
            res.json({ context: describeContext(RequestContext.get()) });
        }
    );

    app.get(
        toExpressPath(CONTRACT_PATH),
        resolveContext,
        createSecurityMiddleware(engine, registry, { path: CONTRACT_PATH }),
        (_req, res) => {
            res.json({ context: describeContext(RequestContext.get()) });
        }
    );

    app.get(
        toExpressPath(PRODUCT_PATH),
        resolveContext,
        createSecurityMiddleware(engine, registry, { path: PRODUCT_PATH }),
        (req, res) => {
            const execution = findExecution(req);
            res.json({
                context: describeContext(RequestContext.get()),
                providers: execution ? enabledProviders(execution.config).map(({ name }) => name) : []
            });
        }
    );

    app.post(
        toExpressPath(REFRESH_PATH),
        resolveContext,
        createSecurityMiddleware(engine, registry, { path: REFRESH_PATH }),
        async (_req, res, next) => {
            try {
                const config = await configResolver.refreshConfig(RequestContext.get().tenantId);
                res.json({ tenantId: config.tenantId, refreshed: true });
            } catch (error) {
                next(error);
            }
        }
    );

    app.use(createErrorHandler());

    app.listen(settings.port, () => {
        logger.info({ port: settings.port }, "Context gateway listening");
    });
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
