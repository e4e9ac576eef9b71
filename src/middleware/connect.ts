/**
 * Adapter for Connect/Express-style middleware: (req, res, next) => void.
 *
 * The foreign convention has no context parameter, so `next` enters the inner
 * handler with background(). Values bound by outer constructors are not
 * visible to handlers reached through an adapted middleware, and the inner
 * handlers do not see the request's cancellation.
 *
 * The adapted handler finishes with whichever comes first: `next()` (then it
 * settles with the inner handler), `next(err)` (fails with `err`), or the
 * response emitting 'finish'/'close' before `next` was called. When none of
 * these has happened by the time the middleware returns, a promise is
 * returned so a deferred `next` is still awaited by outer middleware.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { background } from '../context/context.js';
import { handlerFunc, type Constructor, type HandlerResult } from './handler.js';

export type ConnectNext = (err?: unknown) => void;

export type ConnectMiddleware = (
  req: IncomingMessage,
  res: ServerResponse,
  next: ConnectNext
) => void;

type Outcome = { result: HandlerResult } | { error: unknown };

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function unwrap(outcome: Outcome): HandlerResult {
  if ('error' in outcome) throw outcome.error;
  return outcome.result;
}

export function adaptConnect(middleware: ConnectMiddleware): Constructor {
  return (next) =>
    handlerFunc((_ctx, req, res) => {
      const state: {
        nextCalled: boolean;
        outcome: Outcome | null;
        settle: ((outcome: Outcome) => void) | null;
      } = { nextCalled: false, outcome: null, settle: null };

      const detach = (): void => {
        res.off('finish', onEnd);
        res.off('close', onEnd);
      };

      const report = (outcome: Outcome): void => {
        detach();
        if (state.outcome) return;
        state.outcome = outcome;
        state.settle?.(outcome);
      };

      const onEnd = (): void => {
        if (!state.nextCalled) report({ result: undefined });
      };

      res.once('finish', onEnd);
      res.once('close', onEnd);

      try {
        middleware(req, res, (err) => {
          if (state.nextCalled || state.outcome) return;
          state.nextCalled = true;

          if (err !== undefined && err !== null) {
            report({ error: toError(err) });
            return;
          }

          // The inner handler may end the response itself
          detach();
          try {
            report({ result: next.serve(background(), req, res) });
          } catch (innerErr) {
            report({ error: innerErr });
          }
        });
      } catch (err) {
        detach();
        throw err;
      }

      const outcome = state.outcome;
      if (outcome) return unwrap(outcome);

      return new Promise<void>((resolve, reject) => {
        state.settle = (late) => {
          if ('error' in late) {
            reject(late.error);
            return;
          }
          Promise.resolve(late.result).then(resolve, reject);
        };
      });
    });
}
