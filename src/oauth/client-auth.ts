/**
 * Client authentication strategies for the token endpoint.
 *
 * A strategy contributes headers and/or form parameters to an outgoing
 * token request. Assertion-based authentication (private_key_jwt) travels
 * inside the TokenExchangeRequest itself, so those suppliers use NoneAuth
 * at the transport level.
 */

import { ClientSecretConfigurationError } from '../utils/errors.js';

export interface ClientAuthContribution {
  headers: Record<string, string>;
  params: Record<string, string>;
}

export interface ClientAuthStrategy {
  /** RFC 8414 `token_endpoint_auth_method` this strategy implements */
  readonly method: 'client_secret_basic' | 'none';

  apply(zoneId?: string): ClientAuthContribution;
}

// RFC 6749 §2.3.1: form-urlencode before base64
function encodeCredential(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, '+');
}

/**
 * HTTP Basic client authentication (client_secret_basic).
 */
export class BasicAuth implements ClientAuthStrategy {
  readonly method = 'client_secret_basic' as const;

  constructor(
    readonly clientId: string,
    private readonly clientSecret: string
  ) {
    if (!clientId || !clientSecret) {
      throw new ClientSecretConfigurationError('Client id and client secret must be non-empty strings');
    }
  }

  apply(): ClientAuthContribution {
    const encoded = Buffer.from(
      `${encodeCredential(this.clientId)}:${encodeCredential(this.clientSecret)}`
    ).toString('base64');
    return { headers: { Authorization: `Basic ${encoded}` }, params: {} };
  }
}

/**
 * Per-zone Basic credentials. The zone must be supplied when applying.
 */
export class MultiZoneBasicAuth implements ClientAuthStrategy {
  readonly method = 'client_secret_basic' as const;
  private readonly zones = new Map<string, BasicAuth>();

  constructor(credentials: Record<string, readonly [string, string]>) {
    for (const [zoneId, [clientId, clientSecret]] of Object.entries(credentials)) {
      this.zones.set(zoneId, new BasicAuth(clientId, clientSecret));
    }
    if (this.zones.size === 0) {
      throw new ClientSecretConfigurationError('Multi-zone credentials must define at least one zone');
    }
  }

  zoneIds(): string[] {
    return [...this.zones.keys()];
  }

  forZone(zoneId: string | undefined): BasicAuth {
    const auth = zoneId === undefined ? undefined : this.zones.get(zoneId);
    if (!auth) {
      throw new ClientSecretConfigurationError(
        `No credentials configured for zone '${zoneId ?? ''}'. Available zones: ${this.zoneIds().join(', ')}`,
        { zoneId, availableZones: this.zoneIds() }
      );
    }
    return auth;
  }

  apply(zoneId?: string): ClientAuthContribution {
    return this.forZone(zoneId).apply();
  }
}

/**
 * No transport-level authentication. Used when the client authenticates
 * with an assertion carried in the request body.
 */
export class NoneAuth implements ClientAuthStrategy {
  readonly method = 'none' as const;

  constructor(readonly clientId?: string) {}

  apply(): ClientAuthContribution {
    return { headers: {}, params: this.clientId ? { client_id: this.clientId } : {} };
  }
}
