/**
 * TokenVerifier Tests
 *
 * Real RS256 keys from jose; the JWKS endpoint is a stubbed global fetch.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { SignJWT, exportJWK, generateKeyPair, type JWK, type KeyLike } from 'jose';
import { TokenVerifier } from '../../../src/core/token-verifier.js';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { ConfigurationError } from '../../../src/utils/errors.js';

const ISSUER = 'https://auth.example.com';
const JWKS_URI = 'https://auth.example.com/.well-known/jwks.json';

let privateKey: KeyLike;
let publicJwk: JWK;
let otherPrivateKey: KeyLike;

interface SignOptions {
  kid?: string;
  key?: KeyLike | Uint8Array;
  alg?: string;
  issuer?: string;
  exp?: number | null;
}

async function sign(claims: Record<string, unknown>, options: SignOptions = {}): Promise<string> {
  const alg = options.alg ?? 'RS256';
  const header = options.kid === undefined ? { alg, kid: 'k1' } : options.kid ? { alg, kid: options.kid } : { alg };
  const jwt = new SignJWT(claims).setProtectedHeader(header).setIssuer(options.issuer ?? ISSUER).setIssuedAt();
  if (options.exp !== null) {
    jwt.setExpirationTime(options.exp ?? Math.floor(Date.now() / 1000) + 600);
  }
  return jwt.sign(options.key ?? privateKey);
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function serveJwks(keys: JWK[]) {
  const fetchMock = vi.fn(async () => jsonResponse({ keys }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('TokenVerifier', () => {
  beforeAll(async () => {
    const pair = await generateKeyPair('RS256');
    privateKey = pair.privateKey;
    publicJwk = await exportJWK(pair.publicKey);
    otherPrivateKey = (await generateKeyPair('RS256')).privateKey;
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('should require an issuer', () => {
      expect(() => new TokenVerifier({ issuer: '' })).toThrow(ConfigurationError);
    });

    it('should derive the JWKS endpoint from the issuer', () => {
      expect(new TokenVerifier({ issuer: `${ISSUER}/` }).jwksUri).toBe(JWKS_URI);
    });

    it('should accept an explicit JWKS endpoint', () => {
      const verifier = new TokenVerifier({ issuer: ISSUER, jwksUri: 'https://keys.example.com/jwks' });
      expect(verifier.jwksUri).toBe('https://keys.example.com/jwks');
    });
  });

  describe('valid tokens', () => {
    it('should return the access token with scopes and client id', async () => {
      const fetchMock = serveJwks([{ ...publicJwk, kid: 'k1', alg: 'RS256', use: 'sig' }]);
      const token = await sign({ client_id: 'client-1', sub: 'user-1', scope: 'read write', resource: 'https://api.example.com' });
      const verifier = new TokenVerifier({ issuer: ISSUER, requiredScopes: ['read'] });

      const result = await verifier.verify(token);

      expect(result).toMatchObject({
        token,
        clientId: 'client-1',
        scopes: ['read', 'write'],
        resource: 'https://api.example.com',
      });
      expect(result?.claims.sub).toBe('user-1');
      expect(result?.expiresAt).toBeTypeOf('number');
      expect(fetchMock).toHaveBeenCalledWith(JWKS_URI, expect.objectContaining({ headers: { Accept: 'application/json' } }));
    });

    it('should fall back to azp and then sub for the client id', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const verifier = new TokenVerifier({ issuer: ISSUER });

      const fromAzp = await verifier.validate(await sign({ azp: 'azp-client', sub: 'user-1' }));
      const fromSub = await verifier.validate(await sign({ sub: 'user-1' }));

      expect(fromAzp.clientId).toBe('azp-client');
      expect(fromSub.clientId).toBe('user-1');
    });

    it('should match a key by algorithm when the token has no kid', async () => {
      serveJwks([{ ...publicJwk, alg: 'RS256' }]);
      const verifier = new TokenVerifier({ issuer: ISSUER });

      const result = await verifier.validate(await sign({ sub: 'user-1' }, { kid: '' }));

      expect(result.clientId).toBe('user-1');
      expect(verifier.getCacheStats().cachedKeys).toEqual(['_default']);
    });

    it('should accept an array scope claim', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const verifier = new TokenVerifier({ issuer: ISSUER });

      const result = await verifier.validate(await sign({ sub: 'u', scope: ['a', 'b'] }));

      expect(result.scopes).toEqual(['a', 'b']);
    });
  });

  describe('key caching', () => {
    it('should fetch the JWKS once for concurrent verifications', async () => {
      const fetchMock = serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'user-1' });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      const results = await Promise.all(Array.from({ length: 5 }, () => verifier.verify(token)));
      await verifier.verify(token);

      expect(results.every((r) => r?.clientId === 'user-1')).toBe(true);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should fetch again after the cache is cleared', async () => {
      const fetchMock = serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'user-1' });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await verifier.verify(token);
      verifier.clearCache();
      await verifier.verify(token);

      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('rejections', () => {
    it('should reject malformed tokens', async () => {
      const verifier = new TokenVerifier({ issuer: ISSUER });
      await expect(verifier.validate('not-a-jwt')).rejects.toMatchObject({ code: 'INVALID_TOKEN_FORMAT', statusCode: 400 });
    });

    it('should reject a disallowed algorithm before fetching keys', async () => {
      const fetchMock = serveJwks([]);
      const token = await sign({ sub: 'u' }, { alg: 'HS256', key: new TextEncoder().encode('test-secret-test-secret-test-secret') });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(token)).rejects.toMatchObject({ code: 'ALGORITHM_NOT_ALLOWED' });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should reject expired tokens', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'u' }, { exp: Math.floor(Date.now() / 1000) - 60 });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(token)).rejects.toMatchObject({ code: 'TOKEN_EXPIRED', statusCode: 401 });
    });

    it('should reject tokens without an exp claim', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'u' }, { exp: null });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(token)).rejects.toMatchObject({ code: 'INVALID_CLAIMS' });
    });

    it('should reject tokens from another issuer', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'u' }, { issuer: 'https://evil.example.com' });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(token)).rejects.toMatchObject({ code: 'INVALID_CLAIMS' });
    });

    it('should reject tokens signed by a different key', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'u' }, { key: otherPrivateKey });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(token)).rejects.toMatchObject({ code: 'INVALID_SIGNATURE' });
    });

    it('should reject an unknown kid', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const token = await sign({ sub: 'u' }, { kid: 'rotated' });
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(token)).rejects.toMatchObject({ code: 'KEY_NOT_FOUND', statusCode: 401 });
    });

    it('should ignore encryption keys', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1', use: 'enc' }]);
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(await sign({ sub: 'u' }))).rejects.toMatchObject({ code: 'KEY_NOT_FOUND' });
    });

    it('should report a failing JWKS endpoint', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'down' }, 500)));
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(await sign({ sub: 'u' }))).rejects.toMatchObject({
        code: 'JWKS_FETCH_FAILED',
        statusCode: 503,
        details: { originalError: 'HTTP 500' },
      });
    });

    it('should report an invalid JWKS document', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ keys: 'nope' })));
      const verifier = new TokenVerifier({ issuer: ISSUER });

      await expect(verifier.validate(await sign({ sub: 'u' }))).rejects.toMatchObject({ code: 'JWKS_INVALID' });
    });

    it('should reject tokens missing required scopes', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const verifier = new TokenVerifier({ issuer: ISSUER, requiredScopes: ['read', 'admin'] });

      await expect(verifier.validate(await sign({ sub: 'u', scope: 'read' }))).rejects.toMatchObject({
        code: 'INSUFFICIENT_SCOPE',
        statusCode: 403,
        details: { missing: ['admin'] },
      });
    });
  });

  describe('verify()', () => {
    it('should return null and audit the failure', async () => {
      const storage = new InMemoryAuditStorage();
      const verifier = new TokenVerifier({
        issuer: ISSUER,
        auditService: new AuditService({ enabled: true, storage }),
      });

      await expect(verifier.verify('not-a-jwt')).resolves.toBeNull();

      const [entry] = storage.getEntries();
      expect(entry).toMatchObject({
        source: 'auth:verifier',
        action: 'token_verification',
        success: false,
        metadata: { issuer: ISSUER, code: 'INVALID_TOKEN_FORMAT' },
      });
    });

    it('should audit successful verifications', async () => {
      serveJwks([{ ...publicJwk, kid: 'k1' }]);
      const storage = new InMemoryAuditStorage();
      const verifier = new TokenVerifier({
        issuer: ISSUER,
        auditService: new AuditService({ enabled: true, storage }),
      });

      await verifier.verify(await sign({ client_id: 'client-1' }));

      expect(storage.getEntries()[0]).toMatchObject({
        success: true,
        metadata: { issuer: ISSUER, clientId: 'client-1' },
      });
    });
  });
});
