#!/usr/bin/env node
/**
 * Starts the discovery server (protected resource metadata, JWKS, health)
 * from a JSON configuration file.
 *
 *   CONFIG_PATH=./config/delegation.json node dist/start-server.js
 */

import { ConfigManager } from './config/manager.js';
import { createAuthProviderFromConfig } from './config/factory.js';
import { createDelegationServer, delegationErrorHandler, startHTTPServer } from './http/server.js';
import { createLogger, setLogLevel } from './utils/logger.js';

const log = createLogger('Server');

async function main(): Promise<void> {
  const configManager = new ConfigManager({ secretsDir: process.env.SECRETS_DIR });
  const config = await configManager.loadConfig(process.env.CONFIG_PATH);
  setLogLevel(configManager.getLogLevel());
  const provider = createAuthProviderFromConfig(config);

  const port = process.env.SERVER_PORT ? parseInt(process.env.SERVER_PORT, 10) : config.server.port;
  const app = createDelegationServer(provider, { corsOrigins: config.server.corsOrigins });
  app.use(delegationErrorHandler);

  const server = await startHTTPServer(app, port);

  const shutdown = (): void => {
    log.info('Shutting down server...');
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.error('Failed to start server:', error);
  process.exit(1);
});
