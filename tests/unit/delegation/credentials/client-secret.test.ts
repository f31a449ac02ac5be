/**
 * ClientSecret Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ClientSecret } from '../../../../src/delegation/credentials/client-secret.js';
import { ACCESS_TOKEN_TYPE, type TokenExchangeClient } from '../../../../src/oauth/types.js';
import { ClientSecretConfigurationError } from '../../../../src/utils/errors.js';

const client: TokenExchangeClient = {
  issuer: 'https://auth.example.com',
  exchange: vi.fn(),
  discoverMetadata: vi.fn(),
};

describe('ClientSecret', () => {
  describe('single credential pair', () => {
    const credential = new ClientSecret(['client-1', 'test-secret']);

    it('should authenticate with Basic credentials', () => {
      const auth = credential.clientAuth();

      expect(credential.kind).toBe('client_secret');
      expect(credential.isMultiZone).toBe(false);
      expect(auth.method).toBe('client_secret_basic');
      expect(auth.apply().headers.Authorization).toBe(
        `Basic ${Buffer.from('client-1:test-secret').toString('base64')}`
      );
    });

    it('should ignore the zone id', () => {
      expect(credential.clientAuth('any-zone')).toBe(credential.clientAuth());
    });

    it('should prepare a plain access-token exchange', async () => {
      await expect(credential.prepare(client, 'inbound-token', 'https://api.example.com')).resolves.toEqual({
        subjectToken: 'inbound-token',
        subjectTokenType: ACCESS_TOKEN_TYPE,
        resource: 'https://api.example.com',
      });
    });
  });

  describe('per-zone credentials', () => {
    const credential = new ClientSecret({
      zone1: ['client-a', 'test-secret-a'],
      zone2: ['client-b', 'test-secret-b'],
    });

    it('should pick the credentials of the zone', () => {
      expect(credential.isMultiZone).toBe(true);
      expect(credential.clientAuth('zone2').apply().headers.Authorization).toBe(
        `Basic ${Buffer.from('client-b:test-secret-b').toString('base64')}`
      );
    });

    it('should reject an unknown zone', () => {
      expect(() => credential.clientAuth('zone3')).toThrow(ClientSecretConfigurationError);
    });

    it('should reject an empty zone map', () => {
      expect(() => new ClientSecret({})).toThrow('Multi-zone credentials must define at least one zone');
    });
  });

  describe('invalid input', () => {
    it.each([
      ['a string', 'client-1', 'string'],
      ['null', null, 'null'],
      ['a short array', ['client-1'], 'array(1)'],
      ['a number', 42, 'number'],
      ['a map with a malformed pair', { zone1: ['client-1'] }, 'object'],
    ])('should reject %s', (_label, input, described) => {
      expect(() => new ClientSecret(input)).toThrow(
        `Invalid credentials type provided to ClientSecret: ${described}. ` +
          'Expected a [clientId, clientSecret] pair or a map of zone id to pair.'
      );
    });
  });
});
