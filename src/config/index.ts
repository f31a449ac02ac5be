export * from './schema.js';
export { ConfigManager, type ConfigManagerOptions } from './manager.js';
export { createAuthProviderFromConfig, createCredentialSupplier, type FactoryOptions } from './factory.js';
export * from './secrets/index.js';
