export { SingleFlight } from './single-flight.js';
export { JWKSCache, DEFAULT_KID } from './jwks-cache.js';
export type { JWKSCacheConfig, JWKSCacheStats, CachedKey, VerificationKey } from './jwks-cache.js';
export { InMemoryTokenCache } from './token-cache.js';
export type { TokenCache, CachedToken, InMemoryTokenCacheConfig } from './token-cache.js';
