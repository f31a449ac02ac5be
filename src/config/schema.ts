/**
 * Configuration schema
 *
 * One JSON document configures the whole engine: where the authorization
 * server lives, how this service authenticates to it, how inbound tokens are
 * verified, and the optional HTTP surface.
 *
 * Secret values may be written as `{"$secret": "NAME"}`; ConfigManager
 * resolves them before this schema runs.
 */

import { z } from 'zod';

// ============================================================================
// Shared
// ============================================================================

function isSecureUrl(url: string): boolean {
  const isDev = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test';
  return isDev || url.startsWith('https://');
}

const SecureUrlSchema = z
  .string()
  .url()
  .refine(isSecureUrl, { message: 'URL must use HTTPS in production' });

// ============================================================================
// Credentials
// ============================================================================

const ClientPairSchema = z.object({
  clientId: z.string().min(1).describe('OAuth client id'),
  clientSecret: z.string().min(1).describe('OAuth client secret'),
});

export const ClientSecretCredentialSchema = ClientPairSchema.extend({
  type: z.literal('client_secret'),
});

export const MultiZoneClientSecretCredentialSchema = z.object({
  type: z.literal('multi_zone_client_secret'),
  zones: z
    .record(z.string().min(1), ClientPairSchema)
    .refine((zones) => Object.keys(zones).length > 0, { message: 'At least one zone is required' })
    .describe('Client credentials per zone id'),
});

export const WebIdentityCredentialSchema = z.object({
  type: z.literal('web_identity'),
  serverName: z.string().min(1).optional().describe('Sanitized into the key id when keyId is absent'),
  keyId: z.string().min(1).optional().describe('JWKS kid of the signing key'),
  storageDir: z.string().min(1).default('./server_keys').describe('Directory for the key pair files'),
  audience: z
    .union([z.string().min(1), z.record(z.string(), z.string().min(1))])
    .optional()
    .describe('Client assertion audience, or one per zone id'),
  assertionTtlSeconds: z.number().int().min(30).max(3600).default(300),
});

export const EKSWorkloadIdentityCredentialSchema = z.object({
  type: z.literal('eks_workload_identity'),
  tokenFilePath: z.string().min(1).optional().describe('Projected service account token path'),
  envVarName: z
    .string()
    .min(1)
    .default('AWS_CONTAINER_AUTHORIZATION_TOKEN_FILE')
    .describe('Environment variable holding the token path'),
  cacheLeewaySeconds: z.number().int().min(0).default(300),
});

export const CredentialSchema = z.discriminatedUnion('type', [
  ClientSecretCredentialSchema,
  MultiZoneClientSecretCredentialSchema,
  WebIdentityCredentialSchema,
  EKSWorkloadIdentityCredentialSchema,
]);

// ============================================================================
// Provider, verifier, audit, server
// ============================================================================

export const ProviderSettingsSchema = z
  .object({
    zoneUrl: SecureUrlSchema.optional().describe('Authorization server URL (parent domain in multi-zone mode)'),
    zoneId: z.string().min(1).optional(),
    baseUrl: SecureUrlSchema.optional(),
    serverName: z.string().min(1).optional(),
    serverUrl: z.string().url().optional().describe('URL of this resource server'),
    requiredScopes: z.array(z.string().min(1)).default([]),
    enableMultiZone: z.boolean().default(false),
    exchangeTimeoutMs: z.number().int().min(100).max(60000).default(10000),
    maxZoneVerifiers: z.number().int().min(1).default(100).describe('Zone verifiers held at once in multi-zone mode'),
  })
  .refine((settings) => settings.zoneUrl || (settings.zoneId && settings.baseUrl), {
    message: 'zoneUrl, or zoneId together with baseUrl, is required',
  });

export const VerifierSettingsSchema = z.object({
  allowedAlgorithms: z
    .array(z.enum(['RS256', 'RS384', 'RS512', 'PS256', 'ES256', 'ES384', 'EdDSA']))
    .min(1)
    .default(['RS256']),
  jwksUri: SecureUrlSchema.optional(),
  audience: z.union([z.string(), z.array(z.string())]).optional(),
  cacheTtl: z.number().int().min(1).default(300).describe('Key cache TTL in seconds'),
  cacheMaxSize: z.number().int().min(1).default(10),
  clockToleranceSeconds: z.number().min(0).max(300).default(0),
});

export const AuditSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.number().int().min(1).default(10000),
});

export const ServerSettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  corsOrigins: z.array(z.string()).default([]),
});

export const DelegationConfigSchema = z
  .object({
    provider: ProviderSettingsSchema,
    credential: CredentialSchema,
    verifier: VerifierSettingsSchema.default({}),
    audit: AuditSettingsSchema.default({}),
    server: ServerSettingsSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  // WebIdentity signs its assertions as the resource server's client id
  .refine((config) => config.credential.type !== 'web_identity' || config.provider.serverUrl !== undefined, {
    message: 'provider.serverUrl is required for web_identity credentials',
    path: ['provider', 'serverUrl'],
  })
  .refine((config) => config.credential.type !== 'eks_workload_identity' || !config.provider.enableMultiZone, {
    message: 'eks_workload_identity credentials do not support enableMultiZone',
    path: ['provider', 'enableMultiZone'],
  });

export type CredentialConfig = z.infer<typeof CredentialSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type VerifierSettings = z.infer<typeof VerifierSettingsSchema>;
export type AuditSettings = z.infer<typeof AuditSettingsSchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type DelegationConfig = z.infer<typeof DelegationConfigSchema>;
/** Configuration as written, before defaults are applied. */
export type DelegationConfigInput = z.input<typeof DelegationConfigSchema>;
