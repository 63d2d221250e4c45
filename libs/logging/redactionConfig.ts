/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs in clear text.
 */
export const REDACT_KEYS = [
    // Gateway credentials (root and nested)
    'password', '*.password',
    'username', '*.username',
    'credentials', '*.credentials',
    'IB_GATEWAY_PASSWORD', '*.IB_GATEWAY_PASSWORD',

    // Container environment handed to the gateway image
    'environment.PASSWORD', '*.environment.PASSWORD',
    'environment.USERNAME', '*.environment.USERNAME',
    'Env', '*.Env',

    // Transport secrets
    'authorization', '*.authorization',
    'token', '*.token',
    'apiKey', '*.apiKey',

    // Account identifiers
    'accounts', '*.accounts',
    'account_number', '*.account_number'
];

export const REDACT_CENSOR = '[REDACTED]';
