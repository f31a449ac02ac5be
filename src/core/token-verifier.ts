/**
 * Token Verifier - inbound access token validation
 *
 * Verifies JWT access tokens issued by the authorization server:
 * - signature, against keys fetched from the issuer's JWKS endpoint
 * - algorithm allow-list, checked before any key is fetched
 * - expiry and issuer
 * - required scopes (space-delimited `scope` claim)
 *
 * Verification keys are cached per `kid` in a JWKSCache. Concurrent misses
 * for one `kid` share a single JWKS fetch.
 *
 * verify() never throws: every failure yields null and is logged with the
 * reason. validate() exposes the same checks with a typed error instead.
 */

import { decodeProtectedHeader, errors, importJWK, jwtVerify, type JWTPayload } from 'jose';
import { z } from 'zod';
import { JWKSCache, DEFAULT_KID, type CachedKey, type JWKSCacheStats } from '../cache/jwks-cache.js';
import { SingleFlight } from '../cache/single-flight.js';
import type { AuditService } from './audit-service.js';
import { safeAudit } from './audit-service.js';
import type { AccessToken } from './types.js';
import {
  ConfigurationError,
  OAuthSecurityError,
  createSecurityError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('TokenVerifier');

// ============================================================================
// Types
// ============================================================================

export interface TokenVerifierConfig {
  /** Expected `iss` claim (required) */
  issuer: string;

  /** Scopes every token must carry */
  requiredScopes?: string[];

  /** JWKS endpoint (default: `<issuer>/.well-known/jwks.json`) */
  jwksUri?: string;

  /** Accepted signing algorithms (default: ['RS256']) */
  allowedAlgorithms?: string[];

  /** Expected `aud` claim, when set */
  audience?: string | string[];

  /** Key cache TTL in seconds (default: 300) */
  cacheTtl?: number;

  /** Key cache capacity (default: 10) */
  cacheMaxSize?: number;

  /** Clock skew tolerated on exp/nbf, in seconds (default: 0) */
  clockToleranceSeconds?: number;

  /** JWKS fetch timeout in milliseconds (default: 5000) */
  timeoutMs?: number;

  auditService?: AuditService;
}

const JwkSchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

const JwksSchema = z.object({ keys: z.array(JwkSchema) });

type Jwk = z.infer<typeof JwkSchema>;

function scopesOf(payload: JWTPayload): string[] {
  if (typeof payload.scope === 'string') {
    return payload.scope.split(/\s+/).filter(Boolean);
  }
  if (Array.isArray(payload.scope)) {
    return payload.scope.filter((s): s is string => typeof s === 'string');
  }
  return [];
}

function stringClaim(payload: JWTPayload, name: string): string | undefined {
  const value = payload[name];
  return typeof value === 'string' ? value : undefined;
}

// ============================================================================
// TokenVerifier
// ============================================================================

export class TokenVerifier {
  readonly issuer: string;
  readonly jwksUri: string;
  private readonly requiredScopes: string[];
  private readonly allowedAlgorithms: string[];
  private readonly audience?: string | string[];
  private readonly clockToleranceSeconds: number;
  private readonly timeoutMs: number;
  private readonly auditService?: AuditService;
  private readonly jwksCache: JWKSCache;
  private readonly keyFetches = new SingleFlight<string, CachedKey>();

  constructor(config: TokenVerifierConfig) {
    if (!config.issuer) {
      throw new ConfigurationError('Issuer is required for token verification');
    }

    this.issuer = config.issuer;
    this.jwksUri = config.jwksUri ?? `${config.issuer.replace(/\/$/, '')}/.well-known/jwks.json`;
    this.requiredScopes = config.requiredScopes ?? [];
    this.allowedAlgorithms = config.allowedAlgorithms ?? ['RS256'];
    this.audience = config.audience;
    this.clockToleranceSeconds = config.clockToleranceSeconds ?? 0;
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.auditService = config.auditService;
    this.jwksCache = new JWKSCache({
      ttlSeconds: config.cacheTtl ?? 300,
      maxSize: config.cacheMaxSize ?? 10,
    });
  }

  /**
   * Verifies `token`, returning null on any failure.
   */
  async verify(token: string): Promise<AccessToken | null> {
    try {
      const accessToken = await this.validate(token);
      await this.audit(true, { clientId: accessToken.clientId });
      return accessToken;
    } catch (error) {
      const code = error instanceof OAuthSecurityError ? error.code : 'TOKEN_VERIFICATION_FAILED';
      log.debug('Token rejected:', { code, reason: errorMessage(error) });
      await this.audit(false, { code }, errorMessage(error));
      return null;
    }
  }

  /**
   * Verifies `token`, throwing an OAuthSecurityError describing the first
   * failed check.
   */
  async validate(token: string): Promise<AccessToken> {
    let header: ReturnType<typeof decodeProtectedHeader>;
    try {
      header = decodeProtectedHeader(token);
    } catch (error) {
      throw createSecurityError('INVALID_TOKEN_FORMAT', 'Invalid JWT format', 400, {
        originalError: errorMessage(error),
      });
    }

    const algorithm = header.alg;
    if (!algorithm || !this.allowedAlgorithms.includes(algorithm)) {
      throw createSecurityError('ALGORITHM_NOT_ALLOWED', `Algorithm not allowed: ${algorithm ?? 'none'}`, 400);
    }

    const verificationKey = await this.getVerificationKey(header.kid, algorithm);

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, verificationKey.key, {
        algorithms: this.allowedAlgorithms,
        issuer: this.issuer,
        audience: this.audience,
        clockTolerance: this.clockToleranceSeconds,
        requiredClaims: ['exp'],
      }));
    } catch (error) {
      throw this.mapJoseError(error);
    }

    const scopes = scopesOf(payload);
    const missing = this.requiredScopes.filter((scope) => !scopes.includes(scope));
    if (missing.length > 0) {
      throw createSecurityError('INSUFFICIENT_SCOPE', `Missing required scopes: ${missing.join(' ')}`, 403, {
        missing,
      });
    }

    return {
      token,
      clientId:
        stringClaim(payload, 'client_id') ?? stringClaim(payload, 'azp') ?? payload.sub ?? '',
      scopes,
      expiresAt: payload.exp,
      resource: stringClaim(payload, 'resource'),
      claims: { ...payload },
    };
  }

  clearCache(): void {
    this.jwksCache.clear();
  }

  getCacheStats(): JWKSCacheStats {
    return this.jwksCache.getStats();
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async getVerificationKey(kid: string | undefined, algorithm: string): Promise<CachedKey> {
    return this.keyFetches.run(
      kid || DEFAULT_KID,
      () => this.jwksCache.get(kid),
      async () => {
        const jwk = await this.fetchJwk(kid, algorithm);
        const key = await importJWK(jwk, jwk.alg ?? algorithm);
        return this.jwksCache.set(kid, key, algorithm);
      }
    );
  }

  private async fetchJwk(kid: string | undefined, algorithm: string): Promise<Jwk> {
    let body: unknown;
    try {
      const response = await fetch(this.jwksUri, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw createSecurityError('JWKS_FETCH_FAILED', `Failed to fetch JWKS from ${this.jwksUri}`, 503, {
        originalError: errorMessage(error),
      });
    }

    const parsed = JwksSchema.safeParse(body);
    if (!parsed.success) {
      throw createSecurityError('JWKS_INVALID', `Invalid JWKS document at ${this.jwksUri}`, 503);
    }

    const signingKeys = parsed.data.keys.filter((key) => key.use === undefined || key.use === 'sig');
    const match = kid
      ? signingKeys.find((key) => key.kid === kid)
      : signingKeys.find((key) => key.alg === undefined || key.alg === algorithm);
    if (!match) {
      throw createSecurityError('KEY_NOT_FOUND', `No signing key found for kid: ${kid || DEFAULT_KID}`, 401);
    }
    return match;
  }

  private mapJoseError(error: unknown): OAuthSecurityError {
    const originalError = errorMessage(error);

    // JWTExpired extends JWTClaimValidationFailed: check it first
    if (error instanceof errors.JWTExpired) {
      return createSecurityError('TOKEN_EXPIRED', 'Token has expired', 401, { originalError });
    }
    if (error instanceof errors.JWTClaimValidationFailed) {
      return createSecurityError('INVALID_CLAIMS', 'Token claims validation failed', 401, { originalError });
    }
    if (
      error instanceof errors.JWSSignatureVerificationFailed ||
      error instanceof errors.JWSInvalid ||
      error instanceof errors.JWTInvalid
    ) {
      return createSecurityError('INVALID_SIGNATURE', 'Invalid token signature', 401, { originalError });
    }
    return createSecurityError('TOKEN_VERIFICATION_FAILED', 'Token verification failed', 401, {
      originalError,
    });
  }

  private async audit(success: boolean, metadata: Record<string, unknown>, error?: string): Promise<void> {
    await safeAudit(this.auditService, 'TokenVerifier', {
      timestamp: new Date(),
      source: 'auth:verifier',
      action: 'token_verification',
      success,
      ...(error && { error }),
      metadata: { issuer: this.issuer, ...metadata },
    });
  }
}
