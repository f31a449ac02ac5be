/**
 * Resource server metadata (RFC 9728) and WWW-Authenticate helpers.
 */

import type { AuthProvider } from '../delegation/auth-provider.js';

export const PROTECTED_RESOURCE_PATH = '/.well-known/oauth-protected-resource';
export const JWKS_PATH = '/.well-known/jwks.json';

export interface ProtectedResourceMetadata {
  resource?: string;
  authorization_servers: string[];
  bearer_methods_supported: string[];
  scopes_supported?: string[];
  jwks_uri?: string;
  resource_name?: string;
}

/**
 * Metadata advertised for this resource server. In multi-zone mode the
 * authorization server is the zone's issuer.
 */
export function generateProtectedResourceMetadata(
  provider: AuthProvider,
  zoneId?: string
): ProtectedResourceMetadata {
  const serverUrl = provider.serverUrl?.replace(/\/$/, '');

  return {
    ...(serverUrl && { resource: serverUrl }),
    authorization_servers: [provider.issuerFor(zoneId)],
    bearer_methods_supported: ['header'],
    ...(provider.requiredScopes.length > 0 && { scopes_supported: provider.requiredScopes }),
    ...(serverUrl && provider.getJwks() && { jwks_uri: `${serverUrl}${JWKS_PATH}` }),
    ...(provider.serverName && { resource_name: provider.serverName }),
  };
}

export interface WWWAuthenticateOptions {
  error?: 'invalid_request' | 'invalid_token' | 'insufficient_scope';
  errorDescription?: string;
  scope?: string;
  resourceMetadataUrl?: string;
}

function quote(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

/**
 * RFC 6750 Bearer challenge, with the RFC 9728 `resource_metadata` parameter.
 *
 * `generateBearerChallenge({ error: 'invalid_token' })` →
 * `Bearer error="invalid_token"`
 */
export function generateBearerChallenge(options: WWWAuthenticateOptions = {}): string {
  const params: string[] = [];
  if (options.error) {
    params.push(`error=${quote(options.error)}`);
  }
  if (options.errorDescription) {
    params.push(`error_description=${quote(options.errorDescription)}`);
  }
  if (options.scope) {
    params.push(`scope=${quote(options.scope)}`);
  }
  if (options.resourceMetadataUrl) {
    params.push(`resource_metadata=${quote(options.resourceMetadataUrl)}`);
  }
  return params.length > 0 ? `Bearer ${params.join(', ')}` : 'Bearer';
}
