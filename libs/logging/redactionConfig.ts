/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'headers.authorization', '*.headers.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'id_token', '*.id_token',
    'password', '*.password',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Provider settings may carry credentials
    'credentials', '*.credentials',
    'properties.secret', '*.properties.secret',

    // Internal
    'jwt', '*.jwt',
    'rawToken', '*.rawToken'
];

export const REDACT_CENSOR = '[REDACTED]';
