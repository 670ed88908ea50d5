import { z } from 'zod';

export const HTTP_VERBS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

export const SecurityRequirementSchema = z.object({
    roles: z.array(z.string().min(1)).default([]),
    permissions: z.array(z.string().min(1)).default([]),
    requireAllRoles: z.boolean().default(false),
    requireAllPermissions: z.boolean().default(false),
    allowAnonymous: z.boolean().default(false),
    requiresAuthentication: z.boolean().default(true),
}).strict();

export const SecurityRuleSchema = z.object({
    path: z.string().min(1).startsWith('/'),
    verb: z.string().transform(v => v.toUpperCase()).pipe(z.enum(HTTP_VERBS)),
    requirement: SecurityRequirementSchema,
}).strict();

export const SecurityRulesFileSchema = z.object({
    version: z.literal('v1'),
    rules: z.array(SecurityRuleSchema),
}).strict();
