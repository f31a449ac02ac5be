export { ClientSecret, type ClientCredentials, type ClientSecretInput } from './client-secret.js';
export { WebIdentity, sanitizeKeyId, type WebIdentityConfig, type LoadedIdentity } from './web-identity.js';
export {
  EKSWorkloadIdentity,
  DEFAULT_EKS_TOKEN_ENV_VAR,
  type EKSWorkloadIdentityConfig,
} from './eks-workload-identity.js';
export {
  FilePrivateKeyStorage,
  InMemoryPrivateKeyStorage,
  type PrivateKeyStorage,
  type StoredKeyPair,
  type KeyMetadata,
  type RsaPublicJwk,
} from './key-storage.js';
