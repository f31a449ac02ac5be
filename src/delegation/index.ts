/**
 * Delegation Module Public API
 */

export { AuthProvider } from './auth-provider.js';
export type {
  AuthProviderConfig,
  ClientFactory,
  ClientFactoryOptions,
  GrantHandler,
  GrantedHandler,
} from './auth-provider.js';

export { AccessContext } from './access-context.js';
export { ZoneClientRegistry, createZoneScopedUrl } from './zone-client-registry.js';
export type { ClientBuilder } from './zone-client-registry.js';

export * from './credentials/index.js';

export type {
  AccessStatus,
  AuthInfo,
  CredentialSupplier,
  IdentityContext,
  ResourceError,
  ResourceErrorCode,
} from './types.js';
