/**
 * Requirement precedence: registry entry, then declarative attachment, then
 * default deny. The order is data so it can be inspected and tested.
 */

import type { RequirementLookup } from './registry.js';
import {
    ANONYMOUS_REQUIREMENT,
    DENY_ALL_REQUIREMENT,
    type OperationDescriptor,
    type RequirementSource,
    type SecurityRequirement
} from './requirement.js';

export const REQUIREMENT_FALLBACK_ORDER = ['registry', 'declarative', 'default-deny'] as const;

export type ResolvedRequirementSource = typeof REQUIREMENT_FALLBACK_ORDER[number];

export interface ResolvedRequirement {
    readonly requirement: SecurityRequirement;
    readonly source: Extract<RequirementSource, ResolvedRequirementSource>;
}

export function resolveRequirement(
    registry: RequirementLookup,
    operation: OperationDescriptor
): ResolvedRequirement {
    for (const source of REQUIREMENT_FALLBACK_ORDER) {
        switch (source) {
            case 'registry': {
                const registered = registry.get(operation.path, operation.verb);
                if (registered) {
                    return { requirement: registered, source };
                }
                break;
            }
            case 'declarative': {
                if (operation.requirement) {
                    return { requirement: operation.requirement, source };
                }
                if (operation.allowAnonymous) {
                    return { requirement: ANONYMOUS_REQUIREMENT, source };
                }
                break;
            }
            case 'default-deny':
                return { requirement: DENY_ALL_REQUIREMENT, source };
        }
    }

    return { requirement: DENY_ALL_REQUIREMENT, source: 'default-deny' };
}
