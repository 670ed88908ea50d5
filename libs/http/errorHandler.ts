import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ResolutionError } from '../errors/ResolutionError.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';

/**
 * Maps resolution failures to their status and code. Anything else is
 * sanitized; only the incident id leaves the process.
 */
export function createErrorHandler(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof ResolutionError) {
            logger.warn({ code: error.code, path: req.path, verb: req.method }, error.message);
            res.status(error.statusCode).json({ error: error.code, message: error.message });
            return;
        }

        const sanitized = ErrorSanitizer.sanitize(error, `HTTP:${req.method} ${req.path}`);
        res.status(500).json({ error: 'InternalError', incidentId: sanitized.incidentId });
    };
}
