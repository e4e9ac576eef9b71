/**
 * Request timeout middleware.
 * Gives the inner chain a context that is cancelled with DeadlineExceededError
 * after `timeoutMs`, and cancelled outright once the inner chain finishes.
 * Inner handlers observe it through ctx.signal / ctx.throwIfDone().
 */

import { withTimeout } from '../context/context.js';
import { handlerFunc, type Constructor } from './handler.js';

export function createTimeoutMiddleware(timeoutMs: number): Constructor {
  return (next) =>
    handlerFunc(async (ctx, req, res) => {
      const [scoped, cancel] = withTimeout(ctx, timeoutMs);
      try {
        await next.serve(scoped, req, res);
      } finally {
        cancel();
      }
    });
}
