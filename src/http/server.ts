/**
 * Express server for a delegating resource server.
 *
 * Hosts the discovery surface every deployment needs:
 * - GET /.well-known/oauth-protected-resource[/:zoneId]  (RFC 9728)
 * - GET /.well-known/jwks.json  (WebIdentity public keys)
 * - GET /health
 *
 * Application routes are added by the caller, behind
 * createBearerAuthMiddleware and grantRoute.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'http';
import type { AuthProvider } from '../delegation/auth-provider.js';
import { OAuthSecurityError, createErrorResponse, sanitizeError } from '../utils/errors.js';
import { JWKS_PATH, PROTECTED_RESOURCE_PATH, generateProtectedResourceMetadata } from './metadata.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HTTP Server');

export interface DelegationServerOptions {
  /** Allowed CORS origins; empty allows any origin */
  corsOrigins?: string[];

  /** Service name reported by /health */
  serviceName?: string;
}

export function createDelegationServer(
  provider: AuthProvider,
  options: DelegationServerOptions = {}
): express.Application {
  const app = express();
  const corsOrigins = options.corsOrigins ?? [];

  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.header('origin');
    if (corsOrigins.length === 0) {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origin && corsOrigins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Zone-Id');
    res.header('Access-Control-Expose-Headers', 'WWW-Authenticate');

    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  const sendResourceMetadata = (res: Response, zoneId?: string): void => {
    try {
      res.json(generateProtectedResourceMetadata(provider, zoneId));
    } catch (error) {
      res.status(400).json({ error: 'invalid_request', error_description: sanitizeError(error).message });
    }
  };

  app.get(PROTECTED_RESOURCE_PATH, (_req: Request, res: Response) => {
    sendResourceMetadata(res);
  });

  app.get(`${PROTECTED_RESOURCE_PATH}/:zoneId`, (req: Request, res: Response) => {
    sendResourceMetadata(res, req.params.zoneId);
  });

  app.get(JWKS_PATH, (_req: Request, res: Response) => {
    const jwks = provider.getJwks();
    if (!jwks) {
      res.status(404).json({ error: 'not_found', error_description: 'No signing keys published' });
      return;
    }
    res.json(jwks);
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: options.serviceName ?? provider.serverName ?? 'delegated-grant',
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}

/**
 * Error handler for the end of the middleware chain. Security errors keep
 * their status code; anything else is a 500.
 */
export function delegationErrorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  // Express recognises error handlers by arity
  _next: NextFunction
): void {
  if (err instanceof OAuthSecurityError) {
    const { statusCode, body } = createErrorResponse(err);
    res.status(statusCode).json(body);
    return;
  }

  log.error('Error:', sanitizeError(err));
  res.status(500).json({ error: 'server_error', error_description: 'Internal server error' });
}

export function startHTTPServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      log.info(`Listening on port ${port}`);
      log.info(`Resource metadata: http://localhost:${port}${PROTECTED_RESOURCE_PATH}`);
      resolve(server);
    });
  });
}
