import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps internal failures in a generic public message carrying an incident id
 * for log correlation. Raw collaborator errors never leave the process.
 */

export class LatticeError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'LatticeError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export function describeError(err: unknown): { message?: string; stack?: string } {
    if (err instanceof Error) {
        return { message: err.message, stack: err.stack };
    }
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err && typeof err === 'object' && 'message' in err) {
        const stack = 'stack' in err ? err.stack : undefined;
        return {
            message: typeof err.message === 'string' ? err.message : undefined,
            stack: typeof stack === 'string' ? stack : undefined
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized LatticeError.
     */
    sanitize: (err: unknown, contextLabel: string): LatticeError => {
        if (err instanceof LatticeError) return err;

        const { message, stack } = describeError(err);

        return new LatticeError(
            `An internal error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: message, stack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel }
        );
    }
};
