/**
 * Paths pino replaces with `[REDACTED]`.
 *
 * Subgraph endpoints are commonly gateway URLs carrying an API key, so the
 * endpoint fields are covered alongside the usual credential names.
 */
export const REDACTION_CONFIG = {
  paths: [
    'apiKey',
    'authorization',
    'token',
    'secret',
    '*.apiKey',
    '*.token',
    '*.secret',
    'endpoint',
    'endpoints',
    '*.endpoint',
    'headers.authorization',
    'headers.Authorization',
    'headers["x-api-key"]',
  ],
  censor: '[REDACTED]',
};
