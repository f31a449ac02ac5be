/**
 * OAuth Exchange Client (RFC 8693 / RFC 8414)
 *
 * fetch-based implementation of TokenExchangeClient:
 * - discovers authorization server metadata (oauth-authorization-server,
 *   then openid-configuration) and caches it per issuer
 * - POSTs form-encoded token-exchange requests to the discovered token
 *   endpoint with the configured client authentication
 * - maps every failure to TokenExchangeError / MetadataDiscoveryError
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8693
 * @see https://datatracker.ietf.org/doc/html/rfc8414
 */

import { z } from 'zod';
import type { AuditService } from '../core/audit-service.js';
import { safeAudit } from '../core/audit-service.js';
import { SingleFlight } from '../cache/single-flight.js';
import type { ClientAuthStrategy } from './client-auth.js';
import {
  TOKEN_EXCHANGE_GRANT_TYPE,
  type AuthorizationServerMetadata,
  type TokenExchangeClient,
  type TokenExchangeRequest,
  type TokenResponse,
} from './types.js';
import {
  ConfigurationError,
  MetadataDiscoveryError,
  TokenExchangeError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('OAuthExchangeClient');

// ============================================================================
// Wire schemas
// ============================================================================

const MetadataResponseSchema = z.object({
  issuer: z.string().min(1),
  token_endpoint: z.string().url(),
  jwks_uri: z.string().url().optional(),
  registration_endpoint: z.string().url().optional(),
  grant_types_supported: z.array(z.string()).optional(),
  token_endpoint_auth_methods_supported: z.array(z.string()).optional(),
});

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().optional(),
  scope: z.string().optional(),
  issued_token_type: z.string().optional(),
  refresh_token: z.string().optional(),
});

const ErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

const WELL_KNOWN_PATHS = [
  '/.well-known/oauth-authorization-server',
  '/.well-known/openid-configuration',
] as const;

// ============================================================================
// Configuration
// ============================================================================

export interface OAuthExchangeClientConfig {
  /** Authorization server issuer URL */
  issuer: string;

  /** Transport-level client authentication */
  auth: ClientAuthStrategy;

  /** Zone this client is bound to, passed to multi-zone auth strategies */
  zoneId?: string;

  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;

  auditService?: AuditService;
}

export function isInsecureAllowed(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';
}

function trimTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

// ============================================================================
// OAuthExchangeClient
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const client = new OAuthExchangeClient({
 *   issuer: 'https://auth.example.com',
 *   auth: new BasicAuth('my-service', secret),
 * });
 *
 * const response = await client.exchange({
 *   subjectToken: inboundToken,
 *   subjectTokenType: ACCESS_TOKEN_TYPE,
 *   resource: 'https://api.example.com',
 * });
 * ```
 */
export class OAuthExchangeClient implements TokenExchangeClient {
  readonly issuer: string;
  private readonly auth: ClientAuthStrategy;
  private readonly zoneId?: string;
  private readonly timeoutMs: number;
  private readonly auditService?: AuditService;
  private readonly metadataCache = new Map<string, AuthorizationServerMetadata>();
  private readonly discovery = new SingleFlight<string, AuthorizationServerMetadata>();

  constructor(config: OAuthExchangeClientConfig) {
    if (!config.issuer) {
      throw new ConfigurationError('OAuthExchangeClient requires an issuer');
    }
    if (!config.issuer.startsWith('https://') && !isInsecureAllowed()) {
      throw new ConfigurationError('Issuer must use HTTPS in production', { issuer: config.issuer });
    }

    this.issuer = trimTrailingSlash(config.issuer);
    this.auth = config.auth;
    this.zoneId = config.zoneId;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.auditService = config.auditService;
  }

  async discoverMetadata(issuer?: string): Promise<AuthorizationServerMetadata> {
    const target = trimTrailingSlash(issuer ?? this.issuer);

    return this.discovery.run(
      target,
      () => this.metadataCache.get(target),
      async () => {
        const metadata = await this.fetchMetadata(target);
        this.metadataCache.set(target, metadata);
        return metadata;
      }
    );
  }

  async exchange(request: TokenExchangeRequest): Promise<TokenResponse> {
    const startTime = Date.now();
    const metadata = await this.discoverMetadata();
    const tokenEndpoint = metadata.tokenEndpoint;

    if (!tokenEndpoint.startsWith('https://') && !isInsecureAllowed()) {
      throw new ConfigurationError('Token endpoint must use HTTPS in production', { tokenEndpoint });
    }

    const contribution = this.auth.apply(this.zoneId);
    const body = new URLSearchParams({ ...this.buildRequestBody(request), ...contribution.params });

    log.debug('Token exchange request:', {
      tokenEndpoint,
      resource: request.resource,
      audience: request.audience,
      zoneId: this.zoneId,
      hasClientAssertion: !!request.clientAssertion,
    });

    try {
      const response = await this.post(tokenEndpoint, body, contribution.headers);
      const tokenResponse = await this.parseTokenResponse(response);

      await this.audit(true, request, { durationMs: Date.now() - startTime });
      return tokenResponse;
    } catch (error) {
      const exchangeError =
        error instanceof TokenExchangeError
          ? error
          : new TokenExchangeError(`Token exchange request failed: ${errorMessage(error)}`, {
              oauthError: 'request_failed',
            });

      await this.audit(false, request, {
        durationMs: Date.now() - startTime,
        error: exchangeError.oauthError,
        httpStatus: exchangeError.httpStatus,
      });
      throw exchangeError;
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async fetchMetadata(issuer: string): Promise<AuthorizationServerMetadata> {
    const failures: string[] = [];

    for (const path of WELL_KNOWN_PATHS) {
      const url = `${issuer}${path}`;
      try {
        const response = await fetch(url, {
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!response.ok) {
          failures.push(`${url}: HTTP ${response.status}`);
          continue;
        }

        const parsed = MetadataResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          failures.push(`${url}: invalid metadata document`);
          continue;
        }

        log.debug('Discovered authorization server metadata:', {
          issuer,
          tokenEndpoint: parsed.data.token_endpoint,
        });
        return {
          issuer: parsed.data.issuer,
          tokenEndpoint: parsed.data.token_endpoint,
          jwksUri: parsed.data.jwks_uri,
          registrationEndpoint: parsed.data.registration_endpoint,
          grantTypesSupported: parsed.data.grant_types_supported,
          tokenEndpointAuthMethodsSupported: parsed.data.token_endpoint_auth_methods_supported,
        };
      } catch (error) {
        failures.push(`${url}: ${errorMessage(error)}`);
      }
    }

    throw new MetadataDiscoveryError(`Failed to discover authorization server metadata for ${issuer}`, {
      issuer,
      failures,
    });
  }

  private async post(
    url: string,
    body: URLSearchParams,
    headers: Record<string, string>
  ): Promise<Response> {
    return fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
        ...headers,
      },
      body: body.toString(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  private async parseTokenResponse(response: Response): Promise<TokenResponse> {
    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new TokenExchangeError(`Token endpoint returned invalid JSON (HTTP ${response.status})`, {
        oauthError: 'invalid_response',
        httpStatus: response.status,
      });
    }

    if (!response.ok) {
      const oauthError = ErrorResponseSchema.safeParse(data);
      const code = oauthError.success ? oauthError.data.error : 'unknown_error';
      const description = oauthError.success
        ? (oauthError.data.error_description ?? `HTTP ${response.status}`)
        : `HTTP ${response.status}`;
      throw new TokenExchangeError(`${code}: ${description}`, {
        oauthError: code,
        httpStatus: response.status,
      });
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TokenExchangeError('Token endpoint response is missing access_token', {
        oauthError: 'invalid_response',
        httpStatus: response.status,
      });
    }

    return {
      accessToken: parsed.data.access_token,
      tokenType: parsed.data.token_type ?? 'Bearer',
      expiresIn: parsed.data.expires_in,
      scope: parsed.data.scope ? parsed.data.scope.split(' ').filter(Boolean) : undefined,
      issuedTokenType: parsed.data.issued_token_type,
      refreshToken: parsed.data.refresh_token,
    };
  }

  private buildRequestBody(request: TokenExchangeRequest): Record<string, string> {
    const body: Record<string, string> = {
      grant_type: TOKEN_EXCHANGE_GRANT_TYPE,
      subject_token: request.subjectToken,
      subject_token_type: request.subjectTokenType,
      resource: request.resource,
    };

    const optional: Array<[string, string | undefined]> = [
      ['audience', request.audience],
      ['scope', request.scope],
      ['requested_token_type', request.requestedTokenType],
      ['actor_token', request.actorToken],
      ['actor_token_type', request.actorTokenType],
      ['client_assertion', request.clientAssertion],
      ['client_assertion_type', request.clientAssertionType],
    ];
    for (const [name, value] of optional) {
      if (value) {
        body[name] = value;
      }
    }

    return body;
  }

  private async audit(
    success: boolean,
    request: TokenExchangeRequest,
    metadata: Record<string, unknown>
  ): Promise<void> {
    await safeAudit(this.auditService, 'OAuthExchangeClient', {
      timestamp: new Date(),
      source: 'oauth:exchange',
      action: 'token_exchange',
      success,
      ...(typeof metadata.error === 'string' && { error: metadata.error }),
      metadata: {
        issuer: this.issuer,
        zoneId: this.zoneId,
        resource: request.resource,
        ...metadata,
      },
    });
  }
}
