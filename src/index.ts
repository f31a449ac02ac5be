/**
 * delegated-grant
 *
 * Delegated authorization for resource servers: verify the caller's token,
 * exchange it (RFC 8693) for one token per downstream resource, and hand the
 * results to your handler in an AccessContext.
 */

export * from './core/index.js';
export * from './cache/index.js';
export * from './oauth/index.js';
export * from './delegation/index.js';
export * from './config/index.js';
export * from './http/index.js';
export * from './utils/errors.js';
export * from './utils/logger.js';
