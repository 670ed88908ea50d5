/**
 * Public exports for the tenant configuration module.
 */

export type {
    ProviderSettings,
    TenantConfiguration,
    TenantConfigurationInput,
    TenantConfigSource
} from './tenantConfig.js';
export {
    createTenantConfiguration,
    isFeatureEnabled,
    getSetting,
    getProvider,
    enabledProviders
} from './tenantConfig.js';

export type { VersionedEntry, VersionedStoreOptions } from './versionedStore.js';
export { VersionedStore } from './versionedStore.js';

export type { ConfigResolverOptions } from './ConfigResolver.js';
export { ConfigResolver } from './ConfigResolver.js';

export { PostgresTenantConfigSource } from './repository.js';
