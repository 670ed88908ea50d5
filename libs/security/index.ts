/**
 * Public exports for the security module.
 */

export type {
    SecurityRequirement,
    RequirementInput,
    RequirementSource,
    DenialReason,
    AuthorizationVerdict,
    OperationDescriptor,
    ExternalPolicyEvaluator
} from './requirement.js';
export {
    defineRequirement,
    describeRequirement,
    ANONYMOUS_REQUIREMENT,
    DENY_ALL_REQUIREMENT
} from './requirement.js';

export type { RegisteredRule, RequirementLookup } from './registry.js';
export { EndpointSecurityRegistry, normalizeVerb, registryKey } from './registry.js';

export type { ResolvedRequirement } from './precedence.js';
export { REQUIREMENT_FALLBACK_ORDER, resolveRequirement } from './precedence.js';

export type { SecurityDecisionEngineOptions } from './decisionEngine.js';
export { SecurityDecisionEngine, evaluateRequirement, matchesRequired } from './decisionEngine.js';

export type { SecurityRule, LoadedSecurityRules } from './registryLoader.js';
export { readSecurityRules, loadSecurityRules } from './registryLoader.js';
