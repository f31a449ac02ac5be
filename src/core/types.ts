/**
 * Core types shared across the cache, verifier, oauth and delegation layers.
 *
 * Architectural Rule: core → oauth → delegation → http
 * Files in src/core/ MUST NOT import from src/delegation/ or src/http/
 */

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field (e.g. 'delegation:grant',
 * 'oauth:exchange', 'auth:verifier').
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Subject or client associated with the event (if applicable) */
  userId?: string;

  /** Action that was performed */
  action: string;

  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  metadata?: Record<string, unknown>;
}

// ============================================================================
// Verification Types
// ============================================================================

/**
 * Verified inbound access token.
 */
export interface AccessToken {
  /** The raw bearer token */
  token: string;

  /** client_id claim, falling back to azp then sub */
  clientId: string;

  /** Space-delimited `scope` claim, split */
  scopes: string[];

  /** Expiry as epoch seconds, when the token carries one */
  expiresAt?: number;

  /** Resource indicator (`resource` claim), when present */
  resource?: string;

  /** All verified claims */
  claims: Record<string, unknown>;
}

// ============================================================================
// JWKS Types
// ============================================================================

export interface PublicJsonWebKey {
  kty: string;
  kid?: string;
  alg?: string;
  use?: string;
  n?: string;
  e?: string;
  crv?: string;
  x?: string;
  y?: string;
}

export interface JsonWebKeySet {
  keys: PublicJsonWebKey[];
}
