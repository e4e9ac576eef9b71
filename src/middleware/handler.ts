/**
 * Context-aware handler capability.
 * A Handler serves one request given the request's Context; a Constructor
 * wraps one Handler in another, forming the middleware onion.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Context } from '../context/context.js';

/** Handlers may finish synchronously or by settling a promise. */
export type HandlerResult = void | Promise<void>;

export interface Handler {
  serve(ctx: Context, req: IncomingMessage, res: ServerResponse): HandlerResult;
}

export type HandlerFunc = (
  ctx: Context,
  req: IncomingMessage,
  res: ServerResponse
) => HandlerResult;

/** Middleware constructor: takes the inner handler, returns the wrapping one. */
export type Constructor = (next: Handler) => Handler;

/** The transport's calling convention; assignable to http.createServer's listener. */
export type TransportHandler = (req: IncomingMessage, res: ServerResponse) => HandlerResult;

/** Lets an ordinary function act as a Handler. */
export function handlerFunc(fn: HandlerFunc): Handler {
  return { serve: fn };
}

/** Adapts a context-free transport handler. The context is dropped. */
export function adaptTransport(listener: TransportHandler): Handler {
  return handlerFunc((_ctx, req, res) => listener(req, res));
}
