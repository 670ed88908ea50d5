import { z } from 'zod';

export const ActionScopeSchema = z.object({
    actionType: z.string().nullish(),
    resourceType: z.string().nullish(),
    active: z.boolean(),
});

export const RoleGrantSchema = z.object({
    roleCode: z.string().nullish(),
    active: z.boolean(),
    scopes: z.array(ActionScopeSchema).nullish(),
});

export const ContractMembershipSchema = z.object({
    contractId: z.string().min(1),
    active: z.boolean(),
    product: z.object({ productId: z.string().min(1) }).nullish(),
    roleGrant: RoleGrantSchema.nullish(),
});

export const SessionRecordSchema = z.object({
    identityId: z.string().min(1).optional(),
    tenantId: z.string().min(1).optional(),
    memberships: z.array(ContractMembershipSchema).nullish(),
});
