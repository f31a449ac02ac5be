export { OAuthExchangeClient, isInsecureAllowed } from './exchange-client.js';
export type { OAuthExchangeClientConfig } from './exchange-client.js';
export { BasicAuth, MultiZoneBasicAuth, NoneAuth } from './client-auth.js';
export type { ClientAuthStrategy, ClientAuthContribution } from './client-auth.js';
export {
  TOKEN_EXCHANGE_GRANT_TYPE,
  ACCESS_TOKEN_TYPE,
  JWT_TOKEN_TYPE,
  JWT_BEARER_ASSERTION_TYPE,
} from './types.js';
export type {
  TokenExchangeRequest,
  TokenResponse,
  TokenExchangeClient,
  AuthorizationServerMetadata,
} from './types.js';
