import { AuditService } from '../core/audit-service.js';
import { InMemoryTokenCache } from '../cache/token-cache.js';
import { AuthProvider, type ClientFactory } from '../delegation/auth-provider.js';
import { ClientSecret } from '../delegation/credentials/client-secret.js';
import { EKSWorkloadIdentity } from '../delegation/credentials/eks-workload-identity.js';
import { WebIdentity } from '../delegation/credentials/web-identity.js';
import type { CredentialSupplier } from '../delegation/types.js';
import type { CredentialConfig, DelegationConfig } from './schema.js';

export interface FactoryOptions {
  /** Overrides the audit service built from `config.audit` */
  auditService?: AuditService;
  clientFactory?: ClientFactory;
}

export function createCredentialSupplier(credential: CredentialConfig): CredentialSupplier {
  switch (credential.type) {
    case 'client_secret':
      return new ClientSecret([credential.clientId, credential.clientSecret]);

    case 'multi_zone_client_secret':
      return new ClientSecret(
        Object.fromEntries(
          Object.entries(credential.zones).map(([zoneId, pair]) => [zoneId, [pair.clientId, pair.clientSecret]])
        )
      );

    case 'web_identity':
      return new WebIdentity({
        serverName: credential.serverName,
        keyId: credential.keyId,
        storageDir: credential.storageDir,
        audience: credential.audience,
        assertionTtlSeconds: credential.assertionTtlSeconds,
      });

    case 'eks_workload_identity':
      return new EKSWorkloadIdentity({
        tokenFilePath: credential.tokenFilePath,
        envVarName: credential.envVarName,
        cache: new InMemoryTokenCache({ expLeewaySeconds: credential.cacheLeewaySeconds }),
      });
  }
}

/**
 * Builds a ready AuthProvider from validated configuration.
 */
export function createAuthProviderFromConfig(
  config: DelegationConfig,
  options: FactoryOptions = {}
): AuthProvider {
  const auditService =
    options.auditService ??
    new AuditService({ enabled: config.audit.enabled, maxEntries: config.audit.maxEntries });

  return new AuthProvider({
    zoneUrl: config.provider.zoneUrl,
    zoneId: config.provider.zoneId,
    baseUrl: config.provider.baseUrl,
    serverName: config.provider.serverName,
    serverUrl: config.provider.serverUrl,
    requiredScopes: config.provider.requiredScopes,
    enableMultiZone: config.provider.enableMultiZone,
    exchangeTimeoutMs: config.provider.exchangeTimeoutMs,
    maxZoneVerifiers: config.provider.maxZoneVerifiers,
    credential: createCredentialSupplier(config.credential),
    verifier: config.verifier,
    clientFactory: options.clientFactory,
    auditService,
  });
}
