/**
 * Express bearer authentication middleware.
 *
 * Verifies the inbound access token and publishes the caller's identity,
 * per response, for grant-wrapped route handlers:
 *
 * ```typescript
 * app.get('/files', createBearerAuthMiddleware({ provider }), grantRoute(listFiles));
 * ```
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { AccessToken } from '../core/types.js';
import type { AuthProvider, GrantedHandler } from '../delegation/auth-provider.js';
import type { IdentityContext } from '../delegation/types.js';
import type { TokenVerifier } from '../core/token-verifier.js';
import { errorMessage } from '../utils/errors.js';
import { generateBearerChallenge, type WWWAuthenticateOptions } from './metadata.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('BearerAuth');

export interface BearerAuthOptions {
  provider: AuthProvider;

  /** Advertised in WWW-Authenticate challenges */
  resourceMetadataUrl?: string;

  /** Header carrying the zone id when the route has no `:zoneId` param (default: x-zone-id) */
  zoneHeader?: string;
}

interface AuthenticatedRequest {
  identity: IdentityContext;
  accessToken: AccessToken;
}

const authenticated = new WeakMap<Response, AuthenticatedRequest>();

/** Identity published by the middleware; empty when the request was not authenticated. */
export function getIdentity(res: Response): IdentityContext {
  return authenticated.get(res)?.identity ?? {};
}

/** Verified inbound token published by the middleware. */
export function getAccessToken(res: Response): AccessToken | undefined {
  return authenticated.get(res)?.accessToken;
}

export function createBearerAuthMiddleware(options: BearerAuthOptions): RequestHandler {
  const { provider, resourceMetadataUrl } = options;
  const zoneHeader = options.zoneHeader ?? 'x-zone-id';

  const reject = (res: Response, status: 400 | 401, challenge: WWWAuthenticateOptions): void => {
    res.setHeader('WWW-Authenticate', generateBearerChallenge({ ...challenge, resourceMetadataUrl }));
    res.status(status).json({
      error: challenge.error ?? 'unauthorized',
      error_description: challenge.errorDescription ?? 'Authentication required',
    });
  };

  const authenticate = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const zoneId = req.params.zoneId ?? req.header(zoneHeader) ?? undefined;

    const authorization = req.header('authorization');
    if (!authorization) {
      log.debug('Missing Authorization header', { path: req.path });
      reject(res, 401, { errorDescription: 'Missing bearer token' });
      return;
    }

    const match = /^Bearer\s+(\S+)$/i.exec(authorization);
    if (!match) {
      reject(res, 400, { error: 'invalid_request', errorDescription: 'Authorization header must use the Bearer scheme' });
      return;
    }
    const bearerToken = match[1];

    if (provider.enableMultiZone && !zoneId) {
      reject(res, 400, { error: 'invalid_request', errorDescription: 'Zone ID is required' });
      return;
    }

    let verifier: TokenVerifier;
    try {
      verifier = provider.getTokenVerifier(zoneId);
    } catch (error) {
      log.debug('Rejected zone', { zoneId, reason: errorMessage(error) });
      reject(res, 400, { error: 'invalid_request', errorDescription: 'Invalid zone id' });
      return;
    }

    const accessToken = await verifier.verify(bearerToken);
    if (!accessToken) {
      reject(res, 401, { error: 'invalid_token', errorDescription: 'Token verification failed' });
      return;
    }

    authenticated.set(res, { identity: { bearerToken, zoneId }, accessToken });
    next();
  };

  return (req, res, next) => {
    authenticate(req, res, next).catch(next);
  };
}

/**
 * Adapts a grant-wrapped handler into an Express route. The handler gets
 * the request as its first extra argument; its result is sent as JSON.
 */
export function grantRoute<TResult>(granted: GrantedHandler<[Request], TResult>): RequestHandler {
  return (req, res, next) => {
    granted(getIdentity(res), req)
      .then((result) => {
        res.json(result);
      })
      .catch(next);
  };
}
