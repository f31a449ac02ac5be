/**
 * Core Module Public API
 *
 * One-way dependency: core → oauth → delegation → http
 */

export { AuditService, InMemoryAuditStorage, safeAudit } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export { TokenVerifier } from './token-verifier.js';
export type { TokenVerifierConfig } from './token-verifier.js';

export type { AuditEntry, AccessToken, JsonWebKeySet, PublicJsonWebKey } from './types.js';
