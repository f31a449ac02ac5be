/**
 * Secret Resolver
 *
 * Walks a parsed configuration object and replaces every
 * `{"$secret": "NAME"}` descriptor with the value from the first provider
 * that holds NAME. Runs before schema validation, so schemas only ever see
 * plain strings.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * const resolved = await resolver.resolveSecrets(JSON.parse(raw));
 * ```
 */

import { type ISecretProvider, isSecretProvider } from './ISecretProvider.js';
import type { AuditService } from '../../core/audit-service.js';
import { safeAudit } from '../../core/audit-service.js';
import { ConfigurationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('SecretResolver');

export interface SecretResolverConfig {
  /** Audit secret resolutions (names and providers only, never values) */
  auditService?: AuditService;

  /** Throw when a secret cannot be resolved (default: true) */
  failFast?: boolean;
}

interface SecretDescriptor {
  $secret: string;
}

function isSecretDescriptor(value: unknown): value is SecretDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    '$secret' in value &&
    typeof value.$secret === 'string' &&
    value.$secret.length > 0
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /** Providers are consulted in the order they were added. */
  public addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('Provider must implement ISecretProvider interface');
    }
    this.providers.push(provider);
  }

  /**
   * Returns a copy of `config` with all descriptors resolved. With
   * `failFast: false`, unresolved descriptors are left in place.
   *
   * @throws ConfigurationError if failFast is set and a secret is unresolved
   */
  public async resolveSecrets(config: unknown): Promise<unknown> {
    return this.resolveNode(config, 'config');
  }

  public getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  public clearProviders(): void {
    this.providers = [];
  }

  private async resolveNode(node: unknown, path: string): Promise<unknown> {
    if (isSecretDescriptor(node)) {
      const value = await this.resolveSecret(node.$secret, path);
      if (value !== undefined) {
        return value;
      }

      const message = `Secret "${node.$secret}" at path "${path}" could not be resolved by any provider.`;
      if (this.failFast) {
        throw new ConfigurationError(`[SecretResolver] ${message}`, { secretName: node.$secret, path });
      }
      log.warn(message);
      return node;
    }

    if (Array.isArray(node)) {
      const resolved: unknown[] = [];
      for (let i = 0; i < node.length; i++) {
        resolved.push(await this.resolveNode(node[i], `${path}[${i}]`));
      }
      return resolved;
    }

    if (isPlainObject(node)) {
      const resolved: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(node)) {
        resolved[key] = await this.resolveNode(child, `${path}.${key}`);
      }
      return resolved;
    }

    return node;
  }

  private async resolveSecret(logicalName: string, path: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      try {
        const value = await provider.resolve(logicalName);
        if (value !== undefined) {
          await this.audit(logicalName, path, true, provider.constructor.name);
          return value;
        }
      } catch (error) {
        log.warn(
          `Provider ${provider.constructor.name} failed to resolve "${logicalName}": ${errorMessage(error)}`
        );
      }
    }

    await this.audit(logicalName, path, false, 'none');
    return undefined;
  }

  private async audit(secretName: string, configPath: string, success: boolean, provider: string): Promise<void> {
    await safeAudit(this.auditService, 'SecretResolver', {
      timestamp: new Date(),
      source: 'secret:resolution',
      userId: 'system',
      action: `resolve:${secretName}`,
      success,
      metadata: { secretName, provider, configPath },
    });
  }
}
