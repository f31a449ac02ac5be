/**
 * Delegation Layer Types
 *
 * Architecture: core → oauth → delegation → http
 * Delegation layer CAN import from core and oauth, but NOT from http.
 */

import type { TokenExchangeClient, TokenExchangeRequest } from '../oauth/types.js';
import type { ClientAuthStrategy } from '../oauth/client-auth.js';

// ============================================================================
// Request-scoped inputs
// ============================================================================

/**
 * What the request layer knows about the caller. The HTTP middleware fills
 * this in; the grant wrapper only reads it.
 */
export interface IdentityContext {
  /** Inbound bearer token, without the `Bearer ` prefix */
  bearerToken?: string;

  /** Tenant zone of the request (multi-zone deployments) */
  zoneId?: string;

  /** Client id the resource server is registered under, when known */
  resourceClientId?: string;
}

/**
 * Per-exchange context handed to a CredentialSupplier.
 */
export interface AuthInfo {
  zoneId?: string;

  /** Client id the assertion is issued for (WebIdentity `iss`/`sub`) */
  resourceClientId?: string;

  /** Inbound access token */
  accessToken?: string;

  /** URL of the resource server performing the exchange */
  resourceServerUrl?: string;
}

// ============================================================================
// Error records
// ============================================================================

export type ResourceErrorCode =
  | 'exchange_token_failed'
  | 'authentication_required'
  | 'missing_zone_id'
  | 'server_configuration';

/**
 * Failure recorded in an AccessContext. Data, not an exception.
 */
export interface ResourceError {
  message: string;
  code: ResourceErrorCode;
  /** Underlying error message, when one exists */
  cause?: string;
}

export type AccessStatus = 'success' | 'partial_error' | 'error';

// ============================================================================
// Credential supply
// ============================================================================

/**
 * Strategy that decides how the service proves its identity when
 * exchanging a caller's token.
 *
 * Implementations: ClientSecret, WebIdentity, EKSWorkloadIdentity.
 */
export interface CredentialSupplier {
  /** Human-readable strategy name, used in logs */
  readonly kind: string;

  /**
   * Transport-level authentication for the exchange client of `zoneId`.
   * Throws a ConfigurationError when the zone is unknown.
   */
  clientAuth(zoneId?: string): ClientAuthStrategy;

  /**
   * Builds the exchange request for one resource. Throws on failure; the
   * orchestrator records the failure against that resource.
   */
  prepare(
    client: TokenExchangeClient,
    subjectToken: string,
    resource: string,
    authInfo?: AuthInfo
  ): Promise<TokenExchangeRequest>;
}
