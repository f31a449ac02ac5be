/**
 * Delegation Server Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { AddressInfo } from 'net';
import type { Server } from 'http';
import {
  createDelegationServer,
  delegationErrorHandler,
  startHTTPServer,
} from '../../../src/http/server.js';
import { AuthProvider } from '../../../src/delegation/auth-provider.js';
import { ClientSecret } from '../../../src/delegation/credentials/client-secret.js';
import { WebIdentity } from '../../../src/delegation/credentials/web-identity.js';
import { InMemoryPrivateKeyStorage } from '../../../src/delegation/credentials/key-storage.js';
import { ResourceAccessError } from '../../../src/utils/errors.js';

function clientSecretProvider(enableMultiZone = false): AuthProvider {
  return new AuthProvider({
    zoneUrl: 'https://auth.example.com',
    serverName: 'files',
    serverUrl: 'https://files.example.com',
    enableMultiZone,
    credential: new ClientSecret(['client-1', 'test-secret']),
  });
}

function portOf(server: Server): number {
  const address: string | AddressInfo | null = server.address();
  return typeof address === 'object' && address !== null ? address.port : 0;
}

describe('createDelegationServer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('protected resource metadata', () => {
    it('should serve the resource metadata', async () => {
      const response = await request(createDelegationServer(clientSecretProvider())).get(
        '/.well-known/oauth-protected-resource'
      );

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        resource: 'https://files.example.com',
        authorization_servers: ['https://auth.example.com'],
        bearer_methods_supported: ['header'],
        resource_name: 'files',
      });
    });

    it('should serve per-zone metadata', async () => {
      const response = await request(createDelegationServer(clientSecretProvider(true))).get(
        '/.well-known/oauth-protected-resource/acme'
      );

      expect(response.body.authorization_servers).toEqual(['https://acme.auth.example.com']);
    });

    it('should reject an invalid zone id', async () => {
      const response = await request(createDelegationServer(clientSecretProvider(true))).get(
        '/.well-known/oauth-protected-resource/bad_zone'
      );

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'invalid_request', error_description: 'Invalid zone id: bad_zone' });
    });
  });

  describe('JWKS', () => {
    it('should answer 404 without signing keys', async () => {
      const response = await request(createDelegationServer(clientSecretProvider())).get('/.well-known/jwks.json');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('not_found');
    });

    it('should publish WebIdentity keys', async () => {
      const provider = new AuthProvider({
        zoneUrl: 'https://auth.example.com',
        credential: new WebIdentity({ keyId: 'files-key', storage: new InMemoryPrivateKeyStorage() }),
      });

      const response = await request(createDelegationServer(provider)).get('/.well-known/jwks.json');

      expect(response.status).toBe(200);
      expect(response.body.keys).toHaveLength(1);
      expect(response.body.keys[0]).toMatchObject({ kty: 'RSA', kid: 'files-key', use: 'sig', alg: 'RS256' });
    });
  });

  describe('health and CORS', () => {
    it('should report health with the service name', async () => {
      const response = await request(createDelegationServer(clientSecretProvider(), { serviceName: 'files-api' })).get(
        '/health'
      );

      expect(response.body).toMatchObject({ status: 'healthy', service: 'files-api' });
      expect(typeof response.body.timestamp).toBe('string');
    });

    it('should answer preflight requests from any origin by default', async () => {
      const response = await request(createDelegationServer(clientSecretProvider()))
        .options('/health')
        .set('Origin', 'https://app.example.com');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should echo only configured origins', async () => {
      const app = createDelegationServer(clientSecretProvider(), { corsOrigins: ['https://app.example.com'] });

      const allowed = await request(app).get('/health').set('Origin', 'https://app.example.com');
      const denied = await request(app).get('/health').set('Origin', 'https://evil.example.com');

      expect(allowed.headers['access-control-allow-origin']).toBe('https://app.example.com');
      expect(allowed.headers.vary).toContain('Origin');
      expect(denied.headers['access-control-allow-origin']).toBeUndefined();
    });
  });

  describe('delegationErrorHandler', () => {
    it('should keep the status of security errors', async () => {
      const app = createDelegationServer(clientSecretProvider());
      app.get('/boom', () => {
        throw new ResourceAccessError('Access denied for https://api.example.com: denied', 'https://api.example.com');
      });
      app.use(delegationErrorHandler);

      const response = await request(app).get('/boom');

      expect(response.status).toBe(403);
      expect(response.body).toEqual({
        error: { code: 'RESOURCE_ACCESS_DENIED', message: 'Access denied for https://api.example.com: denied' },
      });
    });

    it('should hide other errors behind a 500', async () => {
      const app = createDelegationServer(clientSecretProvider());
      app.get('/boom', () => {
        throw new Error('database password is test-secret');
      });
      app.use(delegationErrorHandler);

      const response = await request(app).get('/boom');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: 'server_error', error_description: 'Internal server error' });
    });
  });
});

describe('startHTTPServer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should listen and report a port conflict', async () => {
    const app = createDelegationServer(clientSecretProvider());
    const server = await startHTTPServer(app, 0);

    try {
      const port = portOf(server);
      expect(port).toBeGreaterThan(0);
      await expect(startHTTPServer(app, port)).rejects.toThrow(`Port ${port} is already in use`);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});
