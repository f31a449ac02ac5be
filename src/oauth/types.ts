/**
 * OAuth wire types (RFC 8693 token exchange, RFC 8414 metadata).
 *
 * Field names are camelCase in code; the exchange client maps them to the
 * snake_case form parameters and JSON members on the wire.
 */

export const TOKEN_EXCHANGE_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:token-exchange';
export const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';
export const JWT_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:jwt';
export const JWT_BEARER_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

/**
 * A single RFC 8693 exchange. Built fresh for every exchange and never
 * mutated afterwards.
 */
export interface TokenExchangeRequest {
  readonly subjectToken: string;
  readonly subjectTokenType: string;
  /** Target resource indicator (RFC 8707) */
  readonly resource: string;
  readonly audience?: string;
  readonly scope?: string;
  readonly requestedTokenType?: string;
  readonly actorToken?: string;
  readonly actorTokenType?: string;
  readonly clientAssertion?: string;
  readonly clientAssertionType?: string;
}

export interface TokenResponse {
  accessToken: string;
  tokenType: string;
  /** Lifetime in seconds */
  expiresIn?: number;
  scope?: string[];
  issuedTokenType?: string;
  refreshToken?: string;
}

/**
 * Subset of RFC 8414 authorization server metadata the engine relies on.
 */
export interface AuthorizationServerMetadata {
  issuer: string;
  tokenEndpoint: string;
  jwksUri?: string;
  registrationEndpoint?: string;
  grantTypesSupported?: string[];
  tokenEndpointAuthMethodsSupported?: string[];
}

/**
 * Contract the delegation engine consumes. `OAuthExchangeClient` is the
 * fetch-based default; tests substitute fakes.
 */
export interface TokenExchangeClient {
  /** Issuer this client talks to */
  readonly issuer: string;

  exchange(request: TokenExchangeRequest): Promise<TokenResponse>;

  /**
   * Fetches (or returns cached) metadata. Without an argument the client's
   * own issuer is used.
   */
  discoverMetadata(issuer?: string): Promise<AuthorizationServerMetadata>;
}
