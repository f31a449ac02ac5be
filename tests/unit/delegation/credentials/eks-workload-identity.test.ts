/**
 * EKSWorkloadIdentity Tests
 *
 * The projected token lives in a temp file; federation goes through a fake
 * exchange client.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DEFAULT_EKS_TOKEN_ENV_VAR,
  EKSWorkloadIdentity,
} from '../../../../src/delegation/credentials/eks-workload-identity.js';
import {
  ACCESS_TOKEN_TYPE,
  JWT_BEARER_ASSERTION_TYPE,
  JWT_TOKEN_TYPE,
  type TokenExchangeClient,
  type TokenExchangeRequest,
  type TokenResponse,
} from '../../../../src/oauth/types.js';
import {
  EKSWorkloadIdentityConfigurationError,
  EKSWorkloadIdentityRuntimeError,
} from '../../../../src/utils/errors.js';

const ISSUER = 'https://auth.example.com';
const NOW = 1_800_000_000;

/** Unsigned JWT; only decoded, never verified. */
function unsignedJwt(payload: Record<string, unknown>): string {
  const encode = (value: object) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'none', typ: 'JWT' })}.${encode(payload)}.`;
}

function fakeClient(respond: (request: TokenExchangeRequest) => Promise<TokenResponse>) {
  const exchange = vi.fn(respond);
  const client: TokenExchangeClient = {
    issuer: ISSUER,
    exchange,
    discoverMetadata: vi.fn(),
  };
  return { client, exchange };
}

function derived(exp: number | undefined, expiresIn?: number): TokenResponse {
  const accessToken = exp === undefined ? 'opaque-derived-token' : unsignedJwt({ sub: 'workload', exp });
  return { accessToken, tokenType: 'Bearer', expiresIn };
}

describe('EKSWorkloadIdentity', () => {
  let dir: string;
  let tokenFile: string;
  const platformToken = unsignedJwt({ sub: 'system:serviceaccount:default:files', jti: 'platform-jti-1' });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'eks-identity-'));
    tokenFile = join(dir, 'token');
    writeFileSync(tokenFile, `${platformToken}\n`);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.useRealTimers();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('should read the path from the default environment variable', () => {
      vi.stubEnv(DEFAULT_EKS_TOKEN_ENV_VAR, tokenFile);

      expect(new EKSWorkloadIdentity().tokenFilePath).toBe(tokenFile);
    });

    it('should prefer an explicit path over the environment', () => {
      vi.stubEnv(DEFAULT_EKS_TOKEN_ENV_VAR, '/somewhere/else');

      expect(new EKSWorkloadIdentity({ tokenFilePath: tokenFile }).tokenFilePath).toBe(tokenFile);
    });

    it('should honour a custom environment variable', () => {
      vi.stubEnv('FILES_TOKEN_PATH', tokenFile);

      expect(new EKSWorkloadIdentity({ envVarName: 'FILES_TOKEN_PATH' }).tokenFilePath).toBe(tokenFile);
    });

    it('should fail without a path', () => {
      vi.stubEnv('UNSET_TOKEN_PATH_VAR', '');

      expect(() => new EKSWorkloadIdentity({ envVarName: 'UNSET_TOKEN_PATH_VAR' })).toThrow(
        new EKSWorkloadIdentityConfigurationError(
          'Failed to initialize EKS workload identity: no token file path provided and environment variable UNSET_TOKEN_PATH_VAR is not set'
        )
      );
    });

    it('should fail when the file cannot be read', () => {
      const missing = join(dir, 'missing');

      expect(() => new EKSWorkloadIdentity({ tokenFilePath: missing })).toThrow(
        `Failed to initialize EKS workload identity: cannot read token file at ${missing}:`
      );
    });

    it('should fail when the file is empty', () => {
      writeFileSync(tokenFile, '  \n');

      expect(() => new EKSWorkloadIdentity({ tokenFilePath: tokenFile })).toThrow(
        `Failed to initialize EKS workload identity: Token file is empty at ${tokenFile}`
      );
    });

    it('should use no transport-level client authentication', () => {
      expect(new EKSWorkloadIdentity({ tokenFilePath: tokenFile }).clientAuth().method).toBe('none');
    });
  });

  describe('readToken', () => {
    it('should trim the token', async () => {
      await expect(new EKSWorkloadIdentity({ tokenFilePath: tokenFile }).readToken()).resolves.toBe(platformToken);
    });

    it('should pick up a rotated token', async () => {
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });
      writeFileSync(tokenFile, 'rotated-token');

      await expect(identity.readToken()).resolves.toBe('rotated-token');
    });

    it('should fail when the file disappears', async () => {
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });
      rmSync(tokenFile);

      const error = await identity.readToken().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(EKSWorkloadIdentityRuntimeError);
      expect(error).toMatchObject({
        message: `Failed to read EKS workload identity token at runtime: Token file not found (${tokenFile})`,
        statusCode: 503,
      });
    });

    it('should fail when the file becomes empty', async () => {
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });
      writeFileSync(tokenFile, '');

      await expect(identity.readToken()).rejects.toThrow(
        `Failed to read EKS workload identity token at runtime: Token file is empty (${tokenFile})`
      );
    });
  });

  describe('getApplicationCredential', () => {
    it('should federate the platform token against the issuer', async () => {
      const response = derived(Math.floor(Date.now() / 1000) + 3600);
      const { client, exchange } = fakeClient(async () => response);
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await expect(identity.getApplicationCredential(client, platformToken)).resolves.toBe(response.accessToken);
      expect(exchange).toHaveBeenCalledWith({
        subjectToken: platformToken,
        subjectTokenType: JWT_TOKEN_TYPE,
        resource: ISSUER,
      });
    });

    it('should make one backend call for concurrent misses', async () => {
      let release: (value: TokenResponse) => void = () => undefined;
      const { client, exchange } = fakeClient(
        () => new Promise<TokenResponse>((resolve) => {
          release = resolve;
        })
      );
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      const calls = Array.from({ length: 10 }, () => identity.getApplicationCredential(client, platformToken));
      release(derived(Math.floor(Date.now() / 1000) + 3600));
      const tokens = await Promise.all(calls);

      expect(exchange).toHaveBeenCalledTimes(1);
      expect(new Set(tokens).size).toBe(1);
    });

    it('should serve from cache until the leeway window', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW * 1000);
      const { client, exchange } = fakeClient(async () => derived(Math.floor(Date.now() / 1000) + 3600));
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await identity.getApplicationCredential(client, platformToken);
      vi.setSystemTime((NOW + 3299) * 1000);
      await identity.getApplicationCredential(client, platformToken);
      expect(exchange).toHaveBeenCalledTimes(1);

      vi.setSystemTime((NOW + 3300) * 1000);
      await identity.getApplicationCredential(client, platformToken);
      expect(exchange).toHaveBeenCalledTimes(2);
    });

    it('should key the cache by the platform token jti', async () => {
      const { client, exchange } = fakeClient(async () => derived(Math.floor(Date.now() / 1000) + 3600));
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await identity.getApplicationCredential(client, platformToken);
      await identity.getApplicationCredential(client, unsignedJwt({ jti: 'platform-jti-1', sub: 'reissued' }));
      await identity.getApplicationCredential(client, unsignedJwt({ jti: 'platform-jti-2' }));

      expect(exchange).toHaveBeenCalledTimes(2);
    });

    it('should cache opaque platform tokens by digest', async () => {
      const { client, exchange } = fakeClient(async () => derived(Math.floor(Date.now() / 1000) + 3600));
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await identity.getApplicationCredential(client, 'opaque-platform-token');
      await identity.getApplicationCredential(client, 'opaque-platform-token');

      expect(exchange).toHaveBeenCalledTimes(1);
    });

    it('should fall back to expires_in for opaque derived tokens', async () => {
      const { client, exchange } = fakeClient(async () => derived(undefined, 3600));
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await identity.getApplicationCredential(client, platformToken);
      await identity.getApplicationCredential(client, platformToken);

      expect(exchange).toHaveBeenCalledTimes(1);
    });

    it('should not cache a derived token without expiry', async () => {
      const { client, exchange } = fakeClient(async () => derived(undefined));
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await identity.getApplicationCredential(client, platformToken);
      await identity.getApplicationCredential(client, platformToken);

      expect(exchange).toHaveBeenCalledTimes(2);
    });

    it('should not cache a failed federation', async () => {
      const { client, exchange } = fakeClient(async () => derived(Math.floor(Date.now() / 1000) + 3600));
      exchange.mockRejectedValueOnce(new Error('invalid_grant'));
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await expect(identity.getApplicationCredential(client, platformToken)).rejects.toThrow('invalid_grant');
      await expect(identity.getApplicationCredential(client, platformToken)).resolves.toBeTypeOf('string');
    });
  });

  describe('prepare', () => {
    it('should use the derived token as the client assertion', async () => {
      const response = derived(Math.floor(Date.now() / 1000) + 3600);
      const { client } = fakeClient(async () => response);
      const identity = new EKSWorkloadIdentity({ tokenFilePath: tokenFile });

      await expect(identity.prepare(client, 'inbound-token', 'https://api.example.com')).resolves.toEqual({
        subjectToken: 'inbound-token',
        subjectTokenType: ACCESS_TOKEN_TYPE,
        resource: 'https://api.example.com',
        clientAssertion: response.accessToken,
        clientAssertionType: JWT_BEARER_ASSERTION_TYPE,
      });
    });
  });
});
