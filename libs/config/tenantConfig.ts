/**
 * Tenant configuration model.
 *
 * Produced by the platform configuration source and cached per tenant.
 * Instances are frozen; a refresh replaces the whole value.
 */

export interface ProviderSettings {
    readonly enabled: boolean;
    /** Higher values are preferred */
    readonly priority: number;
    readonly properties: Readonly<Record<string, unknown>>;
}

export interface TenantConfiguration {
    readonly tenantId: string;
    readonly displayName: string;
    readonly providers: Readonly<Record<string, ProviderSettings>>;
    readonly featureFlags: Readonly<Record<string, boolean>>;
    readonly settings: Readonly<Record<string, string>>;
    readonly active: boolean;
}

export interface TenantConfigurationInput {
    tenantId: string;
    displayName?: string;
    providers?: Record<string, { enabled?: boolean; priority?: number; properties?: Record<string, unknown> }>;
    featureFlags?: Record<string, boolean>;
    settings?: Record<string, string>;
    active?: boolean;
}

/**
 * Platform collaborator that owns tenant configuration.
 * Returns null when the tenant has no configuration.
 */
export interface TenantConfigSource {
    fetchTenantConfig(tenantId: string): Promise<TenantConfiguration | null>;
}

export function createTenantConfiguration(input: TenantConfigurationInput): TenantConfiguration {
    const providers: Record<string, ProviderSettings> = {};
    for (const [name, provider] of Object.entries(input.providers ?? {})) {
        providers[name] = Object.freeze({
            enabled: provider.enabled ?? true,
            priority: provider.priority ?? 0,
            properties: Object.freeze({ ...(provider.properties ?? {}) })
        });
    }

    return Object.freeze({
        tenantId: input.tenantId,
        displayName: input.displayName ?? '',
        providers: Object.freeze(providers),
        featureFlags: Object.freeze({ ...(input.featureFlags ?? {}) }),
        settings: Object.freeze({ ...(input.settings ?? {}) }),
        active: input.active ?? true
    });
}

/** Unknown flags are off. */
export function isFeatureEnabled(config: TenantConfiguration, flag: string): boolean {
    return config.featureFlags[flag] === true;
}

export function getSetting(config: TenantConfiguration, key: string): string | undefined;
export function getSetting(config: TenantConfiguration, key: string, fallback: string): string;
export function getSetting(config: TenantConfiguration, key: string, fallback?: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(config.settings, key) ? config.settings[key] : fallback;
}

export function getProvider(config: TenantConfiguration, name: string): ProviderSettings | undefined {
    return Object.prototype.hasOwnProperty.call(config.providers, name) ? config.providers[name] : undefined;
}

/**
 * Enabled providers, highest priority first; equal priorities by name.
 */
export function enabledProviders(config: TenantConfiguration): Array<{ name: string; settings: ProviderSettings }> {
    return Object.entries(config.providers)
        .filter(([, settings]) => settings.enabled)
        .sort(([nameA, a], [nameB, b]) => (b.priority - a.priority) || nameA.localeCompare(nameB))
        .map(([name, settings]) => ({ name, settings }));
}
