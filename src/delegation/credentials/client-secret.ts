import {
  BasicAuth,
  MultiZoneBasicAuth,
  type ClientAuthStrategy,
} from '../../oauth/client-auth.js';
import { ACCESS_TOKEN_TYPE, type TokenExchangeRequest } from '../../oauth/types.js';
import { ClientSecretConfigurationError } from '../../utils/errors.js';
import type { CredentialSupplier } from '../types.js';

export type ClientCredentials = readonly [clientId: string, clientSecret: string];

/** Single credential pair, or one pair per zone id. */
export type ClientSecretInput = ClientCredentials | Record<string, ClientCredentials>;

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `array(${value.length})`;
  }
  return typeof value;
}

function isCredentialPair(value: unknown): value is ClientCredentials {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string'
  );
}

function isZoneCredentialMap(value: unknown): value is Record<string, ClientCredentials> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isCredentialPair)
  );
}

/**
 * Client-secret credential supplier.
 *
 * The service authenticates to the token endpoint with HTTP Basic; exchange
 * requests carry no client assertion.
 *
 * ```typescript
 * new ClientSecret(['my-service', secret]);
 * new ClientSecret({ tenant1: ['id-1', secret1], tenant2: ['id-2', secret2] });
 * ```
 */
export class ClientSecret implements CredentialSupplier {
  readonly kind = 'client_secret';
  private readonly auth: BasicAuth | MultiZoneBasicAuth;

  /**
   * @param credentials - a ClientSecretInput; checked at runtime since values
   *   usually come from parsed configuration
   */
  constructor(credentials: unknown) {
    if (isCredentialPair(credentials)) {
      this.auth = new BasicAuth(credentials[0], credentials[1]);
    } else if (isZoneCredentialMap(credentials)) {
      this.auth = new MultiZoneBasicAuth(credentials);
    } else {
      throw new ClientSecretConfigurationError(
        `Invalid credentials type provided to ClientSecret: ${describeType(credentials)}. ` +
          'Expected a [clientId, clientSecret] pair or a map of zone id to pair.',
        { receivedType: describeType(credentials) }
      );
    }
  }

  get isMultiZone(): boolean {
    return this.auth instanceof MultiZoneBasicAuth;
  }

  /** Configured zone ids; undefined for a single credential pair. */
  zoneIds(): string[] | undefined {
    return this.auth instanceof MultiZoneBasicAuth ? this.auth.zoneIds() : undefined;
  }

  clientAuth(zoneId?: string): ClientAuthStrategy {
    if (this.auth instanceof MultiZoneBasicAuth) {
      return this.auth.forZone(zoneId);
    }
    return this.auth;
  }

  async prepare(
    _client: unknown,
    subjectToken: string,
    resource: string
  ): Promise<TokenExchangeRequest> {
    return {
      subjectToken,
      subjectTokenType: ACCESS_TOKEN_TYPE,
      resource,
    };
  }
}
