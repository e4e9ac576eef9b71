/**
 * Rate limiting middleware.
 * Composable with the chain: each route can have its own config.
 * Uses an IRateLimitStore for persistence.
 * Over-limit requests throw RateLimitError; pair with errorHandler for the 429 response.
 */

import type { IncomingMessage } from 'node:http';
import type { Context } from '../context/context.js';
import { RateLimitError } from '../errors.js';
import { headerValue } from '../http/request.js';
import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import { principalKey } from './authenticate.js';
import { handlerFunc, type Constructor } from './handler.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: IncomingMessage, ctx: Context) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Constructor {
  return (next) =>
    handlerFunc(async (ctx, req, res) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        const now = Math.floor(Date.now() / 1000);
        const retryAfter = Math.max(1, resetAt - now);
        throw new RateLimitError(retryAfter);
      }

      // Headers must be set before the inner chain starts writing
      res.setHeader('X-RateLimit-Limit', String(config.limit));
      res.setHeader('X-RateLimit-Remaining', String(Math.max(0, config.limit - count)));
      res.setHeader('X-RateLimit-Reset', String(resetAt));

      await next.serve(ctx, req, res);
    });
}

// ── Key extraction helpers ──

/** Per-principal key: falls back to the client address when unauthenticated. */
export function principalRateKey(action: string) {
  return (req: IncomingMessage, ctx: Context): string => {
    const principal = ctx.value(principalKey);
    return principal ? `principal:${principal.id}:${action}` : ipKey(action)(req);
  };
}

/** IP-based key: for unauthenticated endpoints. */
export function ipKey(action: string) {
  return (req: IncomingMessage): string => {
    const forwarded = headerValue(req, 'X-Forwarded-For');
    const ip = forwarded?.split(',')[0]?.trim() || req.socket.remoteAddress || 'unknown';
    return `ip:${ip}:${action}`;
  };
}

/** Global key: shared budget across all clients. */
export function globalKey(action: string) {
  return (): string => `global:${action}`;
}
