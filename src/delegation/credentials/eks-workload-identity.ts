/**
 * EKS workload identity credential supplier.
 *
 * Reads the platform-issued service account token from a projected file,
 * federates it once into a derived access token, and uses that derived token
 * as the client assertion for every exchange.
 *
 * The token file is re-read on every call so platform rotation is picked up
 * without a restart. Derived tokens are cached by the platform token's `jti`
 * and fetched through a single flight per key, so N concurrent misses cost
 * exactly one federation call.
 */

import { createHash } from 'crypto';
import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { decodeJwt } from 'jose';
import { SingleFlight } from '../../cache/single-flight.js';
import { InMemoryTokenCache, type TokenCache } from '../../cache/token-cache.js';
import { NoneAuth, type ClientAuthStrategy } from '../../oauth/client-auth.js';
import {
  ACCESS_TOKEN_TYPE,
  JWT_BEARER_ASSERTION_TYPE,
  JWT_TOKEN_TYPE,
  type TokenExchangeClient,
  type TokenExchangeRequest,
  type TokenResponse,
} from '../../oauth/types.js';
import {
  EKSWorkloadIdentityConfigurationError,
  EKSWorkloadIdentityRuntimeError,
  errorMessage,
} from '../../utils/errors.js';
import type { CredentialSupplier } from '../types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('EKSWorkloadIdentity');

export const DEFAULT_EKS_TOKEN_ENV_VAR = 'AWS_CONTAINER_AUTHORIZATION_TOKEN_FILE';

export interface EKSWorkloadIdentityConfig {
  /** Explicit token file path; takes precedence over the environment variable */
  tokenFilePath?: string;

  /** Environment variable holding the token file path */
  envVarName?: string;

  /** Derived token cache (default: InMemoryTokenCache with 300s leeway) */
  cache?: TokenCache;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** `jti` of the platform token, or a digest of the token when it has none. */
function cacheKeyFor(platformToken: string): string {
  try {
    const { jti } = decodeJwt(platformToken);
    if (jti) {
      return jti;
    }
  } catch (error) {
    log.warn('Platform token is not a decodable JWT:', errorMessage(error));
  }
  return createHash('sha256').update(platformToken).digest('hex');
}

/** Expiry (epoch seconds) of a derived token: its `exp` claim, else now + expires_in. */
function derivedExpiry(response: TokenResponse): number | undefined {
  try {
    const { exp } = decodeJwt(response.accessToken);
    if (typeof exp === 'number') {
      return exp;
    }
  } catch (error) {
    log.warn('Derived token is not a decodable JWT:', errorMessage(error));
  }
  if (response.expiresIn !== undefined) {
    return Math.floor(Date.now() / 1000) + response.expiresIn;
  }
  return undefined;
}

export class EKSWorkloadIdentity implements CredentialSupplier {
  readonly kind = 'eks_workload_identity';
  readonly tokenFilePath: string;
  private readonly cache: TokenCache;
  private readonly flights = new SingleFlight<string, string>();

  constructor(config: EKSWorkloadIdentityConfig = {}) {
    const envVarName = config.envVarName ?? DEFAULT_EKS_TOKEN_ENV_VAR;
    const tokenFilePath = config.tokenFilePath ?? process.env[envVarName];

    if (!tokenFilePath) {
      throw new EKSWorkloadIdentityConfigurationError(
        `Failed to initialize EKS workload identity: no token file path provided and environment variable ${envVarName} is not set`,
        { envVarName }
      );
    }

    let contents: string;
    try {
      contents = readFileSync(tokenFilePath, 'utf-8');
    } catch (error) {
      throw new EKSWorkloadIdentityConfigurationError(
        `Failed to initialize EKS workload identity: cannot read token file at ${tokenFilePath}: ${errorMessage(error)}`,
        { tokenFilePath, envVarName }
      );
    }
    if (!contents.trim()) {
      throw new EKSWorkloadIdentityConfigurationError(
        `Failed to initialize EKS workload identity: Token file is empty at ${tokenFilePath}`,
        { tokenFilePath }
      );
    }

    this.tokenFilePath = tokenFilePath;
    this.cache = config.cache ?? new InMemoryTokenCache();
  }

  clientAuth(): ClientAuthStrategy {
    return new NoneAuth();
  }

  async prepare(
    client: TokenExchangeClient,
    subjectToken: string,
    resource: string
  ): Promise<TokenExchangeRequest> {
    const platformToken = await this.readToken();
    const clientAssertion = await this.getApplicationCredential(client, platformToken);

    return {
      subjectToken,
      subjectTokenType: ACCESS_TOKEN_TYPE,
      resource,
      clientAssertion,
      clientAssertionType: JWT_BEARER_ASSERTION_TYPE,
    };
  }

  /**
   * Returns the derived access token for `platformToken`, federating it
   * through `client` on a cache miss.
   */
  async getApplicationCredential(client: TokenExchangeClient, platformToken: string): Promise<string> {
    const key = cacheKeyFor(platformToken);

    return this.flights.run(
      key,
      () => this.cache.get(key)?.token,
      async () => {
        const response = await client.exchange({
          subjectToken: platformToken,
          subjectTokenType: JWT_TOKEN_TYPE,
          resource: client.issuer,
        });

        const expiresAt = derivedExpiry(response);
        if (expiresAt !== undefined) {
          this.cache.set(key, { token: response.accessToken, expiresAt });
        } else {
          log.warn('Derived token has no expiry; not caching');
        }
        return response.accessToken;
      }
    );
  }

  /** Reads and trims the projected token. Never cached. */
  async readToken(): Promise<string> {
    let contents: string;
    try {
      contents = await readFile(this.tokenFilePath, 'utf-8');
    } catch (error) {
      const reason = isNotFound(error) ? 'Token file not found' : errorMessage(error);
      throw new EKSWorkloadIdentityRuntimeError(
        `Failed to read EKS workload identity token at runtime: ${reason} (${this.tokenFilePath})`,
        { tokenFilePath: this.tokenFilePath }
      );
    }

    const token = contents.trim();
    if (!token) {
      throw new EKSWorkloadIdentityRuntimeError(
        `Failed to read EKS workload identity token at runtime: Token file is empty (${this.tokenFilePath})`,
        { tokenFilePath: this.tokenFilePath }
      );
    }
    return token;
  }
}
