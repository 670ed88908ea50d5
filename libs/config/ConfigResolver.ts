/**
 * Config Resolver
 *
 * Maps a tenant to its configuration, read-through cached by tenant id.
 * - resolveConfig: cached value, else fetch from the platform and store
 * - refreshConfig: evict, then resolve (one fresh fetch)
 * - fetch failures surface as ConfigFetchFailed and are never cached
 *
 * Strict fetch-then-block: a miss waits for the platform; there is no
 * background revalidation. Concurrent misses for one tenant share a fetch.
 */

import { logger } from '../logging/logger.js';
import { ResolutionError } from '../errors/ResolutionError.js';
import { VersionedStore, type VersionedStoreOptions } from './versionedStore.js';
import type { TenantConfigSource, TenantConfiguration } from './tenantConfig.js';

interface InflightFetch {
    readonly generation: number;
    readonly promise: Promise<TenantConfiguration>;
}

export interface ConfigResolverOptions extends VersionedStoreOptions {
    store?: VersionedStore<TenantConfiguration>;
}

export class ConfigResolver {
    private readonly store: VersionedStore<TenantConfiguration>;
    private readonly inflight = new Map<string, InflightFetch>();

    constructor(
        private readonly source: TenantConfigSource,
        options: ConfigResolverOptions = {}
    ) {
        this.store = options.store ?? new VersionedStore<TenantConfiguration>(options);
    }

    public async resolveConfig(tenantId: string): Promise<TenantConfiguration> {
        const cached = this.store.get(tenantId);
        if (cached) {
            logger.debug({ tenantId, version: cached.version }, 'Tenant configuration served from cache');
            return cached.value;
        }

        const generation = this.store.generation(tenantId);
        const existing = this.inflight.get(tenantId);
        if (existing && existing.generation === generation) {
            return existing.promise;
        }

        const entry: InflightFetch = { generation, promise: this.fetchFromPlatform(tenantId) };
        this.inflight.set(tenantId, entry);

        try {
            const config = await entry.promise;
            if (this.store.put(tenantId, config, generation)) {
                logger.debug({ tenantId }, 'Tenant configuration cached');
            } else {
                logger.debug({ tenantId }, 'Tenant configuration superseded by invalidation; not cached');
            }
            return config;
        } finally {
            if (this.inflight.get(tenantId) === entry) {
                this.inflight.delete(tenantId);
            }
        }
    }

    public async refreshConfig(tenantId: string): Promise<TenantConfiguration> {
        logger.debug({ tenantId }, 'Refreshing tenant configuration');
        this.invalidate(tenantId);
        return this.resolveConfig(tenantId);
    }

    public isCached(tenantId: string): boolean {
        return this.store.has(tenantId);
    }

    public invalidate(tenantId: string): void {
        this.store.evict(tenantId);
        this.inflight.delete(tenantId);
    }

    public clear(): void {
        this.store.clear();
        this.inflight.clear();
        logger.info('Tenant configuration cache cleared');
    }

    private async fetchFromPlatform(tenantId: string): Promise<TenantConfiguration> {
        let config: TenantConfiguration | null;
        try {
            config = await this.source.fetchTenantConfig(tenantId);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error({ tenantId, error: message }, 'Tenant configuration fetch failed');
            throw new ResolutionError('ConfigFetchFailed', `Configuration fetch failed for tenant ${tenantId}`, { cause: error });
        }

        if (!config) {
            logger.warn({ tenantId }, 'No configuration found for tenant');
            throw new ResolutionError('ConfigFetchFailed', `No configuration found for tenant ${tenantId}`);
        }

        return config;
    }
}
