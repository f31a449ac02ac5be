/**
 * WebIdentity credential supplier (private_key_jwt, RFC 7523).
 *
 * The service holds an RSA key pair and signs a short-lived client assertion
 * for every exchange. The public half is published through getJwks() so the
 * authorization server can verify the assertions.
 */

import { createPrivateKey, generateKeyPairSync, randomUUID, type KeyObject } from 'crypto';
import { SignJWT } from 'jose';
import { NoneAuth, type ClientAuthStrategy } from '../../oauth/client-auth.js';
import {
  ACCESS_TOKEN_TYPE,
  JWT_BEARER_ASSERTION_TYPE,
  type TokenExchangeClient,
  type TokenExchangeRequest,
} from '../../oauth/types.js';
import { ConfigurationError, CredentialRuntimeError } from '../../utils/errors.js';
import type { JsonWebKeySet } from '../../core/types.js';
import type { AuthInfo, CredentialSupplier } from '../types.js';
import {
  FilePrivateKeyStorage,
  type KeyMetadata,
  type PrivateKeyStorage,
  type RsaPublicJwk,
} from './key-storage.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('WebIdentity');

const SIGNING_ALGORITHM = 'RS256';

export interface WebIdentityConfig {
  /** Server name; sanitized into the key id when `keyId` is not given */
  serverName?: string;

  /** Explicit key id (the JWKS `kid`) */
  keyId?: string;

  /** Key storage (default: FilePrivateKeyStorage at `storageDir`) */
  storage?: PrivateKeyStorage;

  /** Directory for file-based key storage (default: ./server_keys) */
  storageDir?: string;

  /** Assertion audience: one value, or one per zone id. Defaults to the token endpoint. */
  audience?: string | Record<string, string>;

  /** Assertion lifetime in seconds (default: 300) */
  assertionTtlSeconds?: number;
}

export interface LoadedIdentity {
  privateKey: KeyObject;
  publicJwk: RsaPublicJwk;
}

export function sanitizeKeyId(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_');
}

export class WebIdentity implements CredentialSupplier {
  readonly kind = 'web_identity';
  readonly keyId: string;
  private readonly storage: PrivateKeyStorage;
  private readonly audience?: string | Record<string, string>;
  private readonly assertionTtlSeconds: number;
  private identity?: LoadedIdentity;

  constructor(config: WebIdentityConfig = {}) {
    const rawKeyId = config.keyId ?? config.serverName;
    this.keyId = rawKeyId ? sanitizeKeyId(rawKeyId) : `server-${randomUUID()}`;
    this.storage = config.storage ?? new FilePrivateKeyStorage(config.storageDir ?? './server_keys');
    this.audience = config.audience;
    this.assertionTtlSeconds = config.assertionTtlSeconds ?? 300;

    if (this.assertionTtlSeconds <= 0) {
      throw new ConfigurationError('assertionTtlSeconds must be positive');
    }
  }

  clientAuth(): ClientAuthStrategy {
    // The assertion travels in the request body
    return new NoneAuth();
  }

  async prepare(
    client: TokenExchangeClient,
    subjectToken: string,
    resource: string,
    authInfo?: AuthInfo
  ): Promise<TokenExchangeRequest> {
    const resourceClientId = authInfo?.resourceClientId;
    if (!resourceClientId) {
      throw new CredentialRuntimeError(
        "authInfo with 'resourceClientId' is required for WebIdentity client assertions"
      );
    }

    const audience = await this.resolveAudience(client, authInfo.zoneId);
    const clientAssertion = await this.createClientAssertion(resourceClientId, audience);

    return {
      subjectToken,
      subjectTokenType: ACCESS_TOKEN_TYPE,
      resource,
      clientAssertion,
      clientAssertionType: JWT_BEARER_ASSERTION_TYPE,
    };
  }

  /**
   * Signs an RS256 assertion with `iss` and `sub` set to `clientId`.
   */
  async createClientAssertion(clientId: string, audience: string): Promise<string> {
    const { privateKey } = this.bootstrap();
    const now = Math.floor(Date.now() / 1000);

    return new SignJWT({})
      .setProtectedHeader({ alg: SIGNING_ALGORITHM, kid: this.keyId, typ: 'JWT' })
      .setIssuer(clientId)
      .setSubject(clientId)
      .setAudience(audience)
      .setJti(randomUUID())
      .setIssuedAt(now)
      .setExpirationTime(now + this.assertionTtlSeconds)
      .sign(privateKey);
  }

  getJwks(): JsonWebKeySet {
    return { keys: [{ ...this.bootstrap().publicJwk }] };
  }

  /**
   * Loads the key pair from storage, generating and persisting one on
   * first run. Idempotent.
   */
  bootstrap(): LoadedIdentity {
    if (this.identity) {
      return this.identity;
    }

    const stored = this.storage.load(this.keyId);
    if (stored) {
      this.identity = {
        privateKey: createPrivateKey(stored.privateKeyPem),
        publicJwk: stored.metadata.publicJwk,
      };
      return this.identity;
    }

    log.info('Generating RSA key pair', { keyId: this.keyId });
    const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
    const exported = publicKey.export({ format: 'jwk' });
    if (typeof exported.n !== 'string' || typeof exported.e !== 'string') {
      throw new ConfigurationError('Generated RSA public key is missing modulus or exponent');
    }

    const publicJwk: RsaPublicJwk = {
      kty: 'RSA',
      n: exported.n,
      e: exported.e,
      alg: SIGNING_ALGORITHM,
      use: 'sig',
      kid: this.keyId,
    };
    const metadata: KeyMetadata = {
      keyId: this.keyId,
      algorithm: SIGNING_ALGORITHM,
      createdAt: new Date().toISOString(),
      publicJwk,
    };
    const privateKeyPem = privateKey.export({ format: 'pem', type: 'pkcs8' }).toString();

    this.storage.save(this.keyId, { privateKeyPem, metadata });
    this.identity = { privateKey, publicJwk };
    return this.identity;
  }

  private async resolveAudience(client: TokenExchangeClient, zoneId?: string): Promise<string> {
    if (typeof this.audience === 'string') {
      return this.audience;
    }
    if (this.audience && zoneId && this.audience[zoneId]) {
      return this.audience[zoneId];
    }
    const metadata = await client.discoverMetadata();
    return metadata.tokenEndpoint;
  }
}
