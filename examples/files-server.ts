/**
 * Files API Example
 *
 * A resource server that accepts user tokens from the authorization zone
 * and calls a downstream storage API on the user's behalf.
 *
 * Run with a config such as config/delegation.example.json:
 *
 *   CONFIG_PATH=./config/delegation.example.json SECRETS_DIR=./secrets npx tsx examples/files-server.ts
 */

import type { Request } from 'express';
import {
  ConfigManager,
  createAuthProviderFromConfig,
  createBearerAuthMiddleware,
  createDelegationServer,
  delegationErrorHandler,
  grantRoute,
  setLogLevel,
  startHTTPServer,
} from '../src/index.js';

const STORAGE_API = 'https://storage.example.com';

async function main() {
  const configManager = new ConfigManager({ secretsDir: process.env.SECRETS_DIR });
  const config = await configManager.loadConfig(process.env.CONFIG_PATH);
  setLogLevel(config.logLevel);
  const provider = createAuthProviderFromConfig(config);

  const listFiles = provider.grant(STORAGE_API, async (access, _identity, req: Request) => {
    const { accessToken } = access.access(STORAGE_API);
    const folder = typeof req.query.folder === 'string' ? req.query.folder : '';

    const response = await fetch(`${STORAGE_API}/files?folder=${encodeURIComponent(folder)}`, {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    if (!response.ok) {
      throw new Error(`Storage API returned HTTP ${response.status}`);
    }
    return response.json();
  });

  const app = createDelegationServer(provider, { corsOrigins: config.server.corsOrigins });
  const resourceMetadataUrl = config.provider.serverUrl
    ? `${config.provider.serverUrl.replace(/\/$/, '')}/.well-known/oauth-protected-resource`
    : undefined;
  const auth = createBearerAuthMiddleware({ provider, resourceMetadataUrl });

  app.get('/files', auth, grantRoute(listFiles));
  app.get('/:zoneId/files', auth, grantRoute(listFiles));
  app.use(delegationErrorHandler);

  const server = await startHTTPServer(app, config.server.port);

  const shutdown = (signal: string) => {
    console.log(`\n[Files Example] Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('[Files Example] Failed to start server:', error);
  process.exit(1);
});
