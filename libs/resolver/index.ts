/**
 * Public exports for context resolution.
 */

export type { InboundRequest, ContextStrategy } from './strategy.js';
export { selectStrategy, readHeader } from './strategy.js';

export type { HeaderStrategyOptions } from './strategies/headerStrategy.js';
export { HeaderContextStrategy } from './strategies/headerStrategy.js';
export type { TokenClaimStrategyOptions } from './strategies/tokenClaimStrategy.js';
export { TokenClaimStrategy } from './strategies/tokenClaimStrategy.js';

export type { ContextResolverOptions } from './ContextResolver.js';
export { ContextResolver } from './ContextResolver.js';
export type { ApplicationExecutionContext } from './ExecutionScopeService.js';
export { ExecutionScopeService } from './ExecutionScopeService.js';
