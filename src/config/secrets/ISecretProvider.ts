/**
 * A source of secret values (files, environment, a vault).
 *
 * Providers are tried in order by SecretResolver until one returns a value.
 */
export interface ISecretProvider {
  /**
   * Resolves a logical secret name (e.g. "OAUTH_CLIENT_SECRET").
   *
   * Returns undefined when this provider does not hold the secret, so the
   * next provider in the chain is tried. Throws only on unexpected failures.
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(obj: unknown): obj is ISecretProvider {
  return typeof obj === 'object' && obj !== null && 'resolve' in obj && typeof obj.resolve === 'function';
}
