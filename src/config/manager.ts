import { readFile } from 'fs/promises';
import { DelegationConfigSchema, type DelegationConfig } from './schema.js';
import { SecretResolver, FileSecretProvider, EnvProvider } from './secrets/index.js';
import type { AuditService } from '../core/audit-service.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ConfigManager');

export interface ConfigManagerOptions {
  /** Audit secret resolution */
  auditService?: AuditService;

  /** Directory for file-based secrets (default: '/run/secrets') */
  secretsDir?: string;

  env?: NodeJS.ProcessEnv;
}

/**
 * Loads, resolves and validates the JSON configuration.
 *
 * Secrets are resolved first (files under `secretsDir`, then environment
 * variables), then the result is parsed with DelegationConfigSchema.
 */
export class ConfigManager {
  private config: DelegationConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options.auditService,
      failFast: true,
    });
    this.secretResolver.addProvider(new FileSecretProvider(options.secretsDir ?? '/run/secrets'));
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  async loadConfig(configPath?: string): Promise<DelegationConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath ?? this.env.CONFIG_PATH ?? './config/delegation.json';

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration: ${errorMessage(error)}`, { path });
    }

    log.info('Resolving secrets...');
    const resolved = await this.secretResolver.resolveSecrets(raw);

    const parsed = DelegationConfigSchema.safeParse(resolved);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { path, issues });
    }

    this.config = parsed.data;
    log.info('Configuration loaded and validated successfully', {
      credential: this.config.credential.type,
      enableMultiZone: this.config.provider.enableMultiZone,
    });
    return this.config;
  }

  async reloadConfig(configPath?: string): Promise<DelegationConfig> {
    this.config = null;
    log.info('Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getConfig(): DelegationConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  getLogLevel(): DelegationConfig['logLevel'] {
    return this.getConfig().logLevel;
  }
}
