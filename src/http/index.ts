export { createDelegationServer, delegationErrorHandler, startHTTPServer } from './server.js';
export type { DelegationServerOptions } from './server.js';
export { createBearerAuthMiddleware, getAccessToken, getIdentity, grantRoute } from './middleware.js';
export type { BearerAuthOptions } from './middleware.js';
export {
  JWKS_PATH,
  PROTECTED_RESOURCE_PATH,
  generateBearerChallenge,
  generateProtectedResourceMetadata,
} from './metadata.js';
export type { ProtectedResourceMetadata, WWWAuthenticateOptions } from './metadata.js';
