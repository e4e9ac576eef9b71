/**
 * Authentication middleware.
 * Extracts the Bearer token from the Authorization header, validates it via an
 * Authenticator, and binds the authenticated principal to the context.
 * Rejected requests never reach the inner chain.
 */

import { createContextKey, withValue } from '../context/context.js';
import { UnauthorizedError } from '../errors.js';
import { sendError } from '../http/respond.js';
import { handlerFunc, type Constructor } from './handler.js';

export interface Principal {
  id: string;
  displayName?: string;
}

export interface Authenticator {
  /** Resolve a bearer token to its principal. Rejects with UnauthorizedError for unknown tokens. */
  authenticate(token: string): Promise<Principal>;
}

export const principalKey = createContextKey<Principal>('principal');

const BEARER_PREFIX = 'Bearer ';

export function createAuthMiddleware(authenticator: Authenticator): Constructor {
  return (next) =>
    handlerFunc(async (ctx, req, res) => {
      const authHeader = req.headers.authorization;

      if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
        sendError(
          res,
          401,
          'UNAUTHORIZED',
          'Missing or invalid Authorization header. Use: Bearer <token>'
        );
        return;
      }

      const token = authHeader.slice(BEARER_PREFIX.length).trim();

      if (!token) {
        sendError(res, 401, 'UNAUTHORIZED', 'Token is empty');
        return;
      }

      let principal: Principal;
      try {
        principal = await authenticator.authenticate(token);
      } catch (err) {
        if (!(err instanceof UnauthorizedError)) throw err;
        sendError(res, 401, 'UNAUTHORIZED', 'Invalid token');
        return;
      }

      await next.serve(withValue(ctx, principalKey, principal), req, res);
    });
}
