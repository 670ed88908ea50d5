import { z } from 'zod';

export const ProviderSettingsSchema = z.object({
    enabled: z.boolean().default(true),
    priority: z.number().int().default(0),
    properties: z.record(z.string(), z.unknown()).default({}),
});

export const TenantConfigurationSchema = z.object({
    tenantId: z.string().min(1),
    displayName: z.string().default(''),
    providers: z.record(z.string(), ProviderSettingsSchema).default({}),
    featureFlags: z.record(z.string(), z.boolean()).default({}),
    settings: z.record(z.string(), z.string()).default({}),
    active: z.boolean().default(true),
});
