/**
 * ResolutionError
 * Raised when the context or configuration pipeline cannot produce a result.
 * Resolution failures abort the pipeline; no partial context is returned.
 */

export type ResolutionErrorCode =
    | 'MissingIdentity'
    | 'MissingTenant'
    | 'MissingScope'
    | 'InvalidSession'
    | 'ConfigFetchFailed';

const STATUS_BY_CODE: Record<ResolutionErrorCode, number> = {
    MissingIdentity: 401,
    MissingTenant: 403,
    MissingScope: 400,
    InvalidSession: 502,
    ConfigFetchFailed: 503
};

export class ResolutionError extends Error {
    readonly code: ResolutionErrorCode;
    readonly statusCode: number;
    public override cause?: unknown;

    constructor(code: ResolutionErrorCode, message?: string, options?: { cause?: unknown }) {
        super(message || `Context resolution failed: ${code}`);
        this.name = 'ResolutionError';
        this.code = code;
        this.statusCode = STATUS_BY_CODE[code];
        this.cause = options?.cause;
        Object.setPrototypeOf(this, ResolutionError.prototype);
    }
}

export function isResolutionError(error: unknown, code?: ResolutionErrorCode): error is ResolutionError {
    return error instanceof ResolutionError && (code === undefined || error.code === code);
}
