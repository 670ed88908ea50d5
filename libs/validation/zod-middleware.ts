import { z } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Validates untrusted input against a schema, logging and throwing a typed
 * error on failure.
 */
export class ValidationError extends Error {
    readonly code = 'VALIDATION_FAILED';

    constructor(
        public readonly context: string,
        public readonly issues: ReadonlyArray<{ path: string; message: string }>
    ) {
        super(`Validation Violation in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Payload itself is not logged: session snapshots and provider settings may hold PII.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}

/**
 * Factory for bound validators.
 */
export const createValidator = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
