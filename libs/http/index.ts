export { matchPathTemplate, templateSpecificity, findRegisteredPattern, toExpressPath, fromExpressPath } from './pathTemplate.js';
export { createContextMiddleware, findExecution } from './contextMiddleware.js';
export type { SecuredOperation } from './securityMiddleware.js';
export { createSecurityMiddleware } from './securityMiddleware.js';
export { createErrorHandler } from './errorHandler.js';
