/**
 * AuthProvider - delegated grant orchestration
 *
 * Wraps request handlers so that, before the handler runs, the caller's
 * bearer token is exchanged (RFC 8693) for one token per target resource.
 * Failures never escape the wrapper: they are recorded in the AccessContext
 * the handler receives, globally or per resource.
 *
 * Architecture: core → oauth → delegation → http
 */

import type { AuditService } from '../core/audit-service.js';
import { safeAudit } from '../core/audit-service.js';
import type { JsonWebKeySet } from '../core/types.js';
import { TokenVerifier, type TokenVerifierConfig } from '../core/token-verifier.js';
import type { ClientAuthStrategy } from '../oauth/client-auth.js';
import { OAuthExchangeClient } from '../oauth/exchange-client.js';
import type { TokenExchangeClient } from '../oauth/types.js';
import {
  AuthProviderConfigurationError,
  MissingAccessContextError,
  MissingContextError,
  errorMessage,
} from '../utils/errors.js';
import { AccessContext } from './access-context.js';
import { ClientSecret } from './credentials/client-secret.js';
import { EKSWorkloadIdentity } from './credentials/eks-workload-identity.js';
import { WebIdentity } from './credentials/web-identity.js';
import type { AuthInfo, CredentialSupplier, IdentityContext, ResourceError } from './types.js';
import { ZoneClientRegistry, createZoneScopedUrl } from './zone-client-registry.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('AuthProvider');

// ============================================================================
// Types
// ============================================================================

export interface ClientFactoryOptions {
  issuer: string;
  zoneId?: string;
  auth: ClientAuthStrategy;
}

/** Builds the exchange client for one zone. Defaults to OAuthExchangeClient. */
export type ClientFactory = (options: ClientFactoryOptions) => TokenExchangeClient | Promise<TokenExchangeClient>;

export interface AuthProviderConfig {
  /**
   * Authorization server URL. In multi-zone mode this is the parent domain
   * and each zone's issuer is `<scheme>://<zoneId>.<host>`.
   */
  zoneUrl?: string;

  /** Zone id; combined with `baseUrl` when `zoneUrl` is not given */
  zoneId?: string;
  baseUrl?: string;

  /** How this service proves its identity during exchanges */
  credential: CredentialSupplier;

  /** Human-readable server name, used in logs */
  serverName?: string;

  /** URL of this resource server; default `resourceClientId` for assertions */
  serverUrl?: string;

  /** Scopes required on inbound tokens */
  requiredScopes?: string[];

  /** Resolve the zone from each request (default: false) */
  enableMultiZone?: boolean;

  /** Per-request exchange timeout in milliseconds */
  exchangeTimeoutMs?: number;

  /** Zone verifiers held at once in multi-zone mode; the oldest is dropped first (default: 100) */
  maxZoneVerifiers?: number;

  /** Extra verifier settings; issuer and required scopes come from this config */
  verifier?: Omit<TokenVerifierConfig, 'issuer' | 'requiredScopes' | 'auditService'>;

  clientFactory?: ClientFactory;

  auditService?: AuditService;
}

export type GrantHandler<TArgs extends unknown[], TResult> = (
  access: AccessContext,
  identity: IdentityContext,
  ...args: TArgs
) => TResult | Promise<TResult>;

export type GrantedHandler<TArgs extends unknown[], TResult> = (
  identity: IdentityContext,
  ...args: TArgs
) => Promise<TResult>;

// ============================================================================
// AuthProvider
// ============================================================================

/**
 * Usage:
 * ```typescript
 * const provider = new AuthProvider({
 *   zoneUrl: 'https://auth.example.com',
 *   serverUrl: 'https://files.example.com',
 *   credential: new ClientSecret(['files-service', secret]),
 * });
 *
 * const listFiles = provider.grant('https://storage.example.com', async (access, identity, folder: string) => {
 *   if (access.hasErrors()) {
 *     return { error: access.getErrors() };
 *   }
 *   const { accessToken } = access.access('https://storage.example.com');
 *   return fetchFolder(folder, accessToken);
 * });
 *
 * await listFiles({ bearerToken }, '/reports');
 * ```
 */
export class AuthProvider {
  readonly zoneUrl: string;
  readonly serverName?: string;
  readonly serverUrl?: string;
  readonly requiredScopes: string[];
  readonly enableMultiZone: boolean;
  readonly credential: CredentialSupplier;
  private readonly exchangeTimeoutMs?: number;
  private readonly maxZoneVerifiers: number;
  private readonly verifierConfig: AuthProviderConfig['verifier'];
  private readonly clientFactory?: ClientFactory;
  private readonly auditService?: AuditService;
  private readonly clients: ZoneClientRegistry;
  private readonly verifiers = new Map<string, TokenVerifier>();

  constructor(config: AuthProviderConfig) {
    this.zoneUrl = AuthProvider.resolveZoneUrl(config);
    this.serverName = config.serverName;
    this.serverUrl = config.serverUrl;
    this.requiredScopes = config.requiredScopes ?? [];
    this.enableMultiZone = config.enableMultiZone ?? false;
    this.credential = config.credential;
    this.exchangeTimeoutMs = config.exchangeTimeoutMs;
    this.maxZoneVerifiers = config.maxZoneVerifiers ?? 100;
    this.verifierConfig = config.verifier;
    this.clientFactory = config.clientFactory;
    this.auditService = config.auditService;

    if (config.credential instanceof ClientSecret && config.credential.isMultiZone && !this.enableMultiZone) {
      throw new AuthProviderConfigurationError(
        'Per-zone client credentials require enableMultiZone: true'
      );
    }
    // Derived EKS tokens are cached by platform token only, not by zone
    if (config.credential instanceof EKSWorkloadIdentity && this.enableMultiZone) {
      throw new AuthProviderConfigurationError('EKSWorkloadIdentity does not support enableMultiZone');
    }
    if (!Number.isInteger(this.maxZoneVerifiers) || this.maxZoneVerifiers < 1) {
      throw new AuthProviderConfigurationError('maxZoneVerifiers must be a positive integer');
    }

    this.clients = new ZoneClientRegistry((zoneId) => this.buildClient(zoneId), this.enableMultiZone);

    log.info('Initialized', {
      zoneUrl: this.zoneUrl,
      serverName: this.serverName,
      credential: this.credential.kind,
      enableMultiZone: this.enableMultiZone,
    });
  }

  /**
   * Wraps `handler` so that every call first exchanges the caller's token
   * for each of `resources`.
   *
   * The handler's first two parameters must be the AccessContext and the
   * identity context; this is checked here, once, through `handler.length`
   * (so neither may be a default or rest parameter).
   *
   * @throws MissingAccessContextError if the handler declares no parameters
   * @throws MissingContextError if the handler does not declare the identity parameter
   * @throws AuthProviderConfigurationError if `resources` is empty
   */
  grant<TArgs extends unknown[], TResult>(
    resources: string | string[],
    handler: GrantHandler<TArgs, TResult>
  ): GrantedHandler<TArgs, TResult> {
    const resourceList = typeof resources === 'string' ? [resources] : [...resources];
    if (resourceList.length === 0 || resourceList.some((resource) => !resource)) {
      throw new AuthProviderConfigurationError('grant() requires at least one non-empty resource');
    }
    if (typeof handler !== 'function' || handler.length < 1) {
      throw new MissingAccessContextError(
        'Handler passed to grant() must accept an AccessContext as its first parameter'
      );
    }
    if (handler.length < 2) {
      throw new MissingContextError(
        'Handler passed to grant() must accept the identity context as its second parameter'
      );
    }

    return async (identity: IdentityContext, ...args: TArgs): Promise<TResult> => {
      const access = new AccessContext();
      await this.exchangeAll(access, resourceList, identity);
      return handler(access, identity, ...args);
    };
  }

  /** Exchange client for `zoneId`, built on first use. */
  async getClient(zoneId?: string): Promise<TokenExchangeClient> {
    return this.clients.getClient(zoneId);
  }

  /** Issuer for `zoneId`: the zone-scoped URL in multi-zone mode, else zoneUrl. */
  issuerFor(zoneId?: string): string {
    return this.enableMultiZone && zoneId ? createZoneScopedUrl(this.zoneUrl, zoneId) : this.zoneUrl;
  }

  /**
   * Verifier for inbound tokens of `zoneId` (or of the single zone).
   * One verifier, and therefore one key cache, per issuer.
   *
   * Zone ids come from requests, so with per-zone client credentials only
   * the configured zones are accepted, and at most `maxZoneVerifiers` are
   * held.
   *
   * @throws AuthProviderConfigurationError for a malformed or unknown zone id
   */
  getTokenVerifier(zoneId?: string): TokenVerifier {
    const issuer = this.issuerFor(zoneId);
    const existing = this.verifiers.get(issuer);
    if (existing) {
      return existing;
    }

    if (this.enableMultiZone && zoneId && this.credential instanceof ClientSecret) {
      const zoneIds = this.credential.zoneIds();
      if (zoneIds && !zoneIds.includes(zoneId)) {
        throw new AuthProviderConfigurationError(`Unknown zone id: ${zoneId}`, { zoneId });
      }
    }

    if (this.verifiers.size >= this.maxZoneVerifiers) {
      const oldest = this.verifiers.keys().next();
      if (!oldest.done) {
        this.verifiers.delete(oldest.value);
        log.info('Verifier capacity reached, dropping oldest', { issuer: oldest.value });
      }
    }

    const verifier = new TokenVerifier({
      ...this.verifierConfig,
      issuer,
      requiredScopes: this.requiredScopes,
      auditService: this.auditService,
    });
    this.verifiers.set(issuer, verifier);
    return verifier;
  }

  /** Number of per-issuer verifiers currently held. */
  get verifierCount(): number {
    return this.verifiers.size;
  }

  /** Public keys of the WebIdentity credential; undefined for other credentials. */
  getJwks(): JsonWebKeySet | undefined {
    return this.credential instanceof WebIdentity ? this.credential.getJwks() : undefined;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private static resolveZoneUrl(config: AuthProviderConfig): string {
    if (config.zoneUrl) {
      return config.zoneUrl.replace(/\/$/, '');
    }
    if (config.zoneId && config.baseUrl) {
      return createZoneScopedUrl(config.baseUrl, config.zoneId);
    }
    throw new AuthProviderConfigurationError('zoneUrl, or zoneId together with baseUrl, is required');
  }

  private async buildClient(zoneId?: string): Promise<TokenExchangeClient> {
    const issuer = this.issuerFor(zoneId);
    const auth = this.credential.clientAuth(zoneId);

    const client = this.clientFactory
      ? await this.clientFactory({ issuer, zoneId, auth })
      : new OAuthExchangeClient({
          issuer,
          auth,
          zoneId,
          timeoutMs: this.exchangeTimeoutMs,
          auditService: this.auditService,
        });

    // Discover now so a misconfigured zone surfaces as a configuration error
    await client.discoverMetadata();
    log.info('Exchange client ready', { issuer, zoneId });
    return client;
  }

  private async exchangeAll(
    access: AccessContext,
    resources: string[],
    identity: IdentityContext
  ): Promise<void> {
    const subjectToken = identity?.bearerToken;
    const zoneId = identity?.zoneId;

    if (!subjectToken) {
      access.setError({
        message: "No authentication token available. Please ensure you're properly authenticated.",
        code: 'authentication_required',
      });
      await this.auditGrant(access, resources, zoneId);
      return;
    }

    if (this.enableMultiZone && !zoneId) {
      access.setError({
        message: 'Zone ID is required for multi-zone configuration but not found in request.',
        code: 'missing_zone_id',
      });
      await this.auditGrant(access, resources, zoneId);
      return;
    }

    let client: TokenExchangeClient;
    try {
      client = await this.clients.getClient(zoneId);
    } catch (error) {
      log.error('Failed to initialize exchange client:', errorMessage(error));
      access.setError({
        message: 'Failed to initialize OAuth client. Server configuration issue.',
        code: 'server_configuration',
        cause: errorMessage(error),
      });
      await this.auditGrant(access, resources, zoneId);
      return;
    }

    const authInfo: AuthInfo = {
      zoneId,
      accessToken: subjectToken,
      resourceClientId: identity.resourceClientId ?? this.serverUrl,
      resourceServerUrl: this.serverUrl,
    };

    for (const resource of resources) {
      try {
        const request = await this.credential.prepare(client, subjectToken, resource, authInfo);
        access.setToken(resource, await client.exchange(request));
      } catch (error) {
        const failure: ResourceError = {
          message: `Token exchange failed for ${resource}: ${errorMessage(error)}`,
          code: 'exchange_token_failed',
          cause: errorMessage(error),
        };
        log.warn('Exchange failed', { resource, zoneId, reason: failure.cause });
        access.setResourceError(resource, failure);
      }
    }

    await this.auditGrant(access, resources, zoneId);
  }

  private async auditGrant(access: AccessContext, resources: string[], zoneId?: string): Promise<void> {
    const globalError = access.getError();
    await safeAudit(this.auditService, 'AuthProvider', {
      timestamp: new Date(),
      source: 'delegation:grant',
      action: 'delegated_grant',
      success: !access.hasErrors(),
      ...(globalError && { error: globalError.code, reason: globalError.message }),
      metadata: {
        status: access.getStatus(),
        zoneId,
        resources,
        successful: access.getSuccessfulResources(),
        failed: access.getFailedResources(),
        credential: this.credential.kind,
      },
    });
  }
}
