/**
 * Error handler middleware.
 * Catches errors thrown by inner handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500.
 */

import type { ServerResponse } from 'node:http';
import { AppError, RateLimitError } from '../errors.js';
import { sendError } from '../http/respond.js';
import { handlerFunc, type Handler } from './handler.js';

export function errorHandler(next: Handler): Handler {
  return handlerFunc(async (ctx, req, res) => {
    try {
      await next.serve(ctx, req, res);
    } catch (err) {
      // Too late to change the status line
      if (res.headersSent) throw err;
      respondWithError(res, err);
    }
  });
}

function respondWithError(res: ServerResponse, err: unknown): void {
  if (err instanceof AppError) {
    const headers: Record<string, string> = {};

    const retryAfter = err.details?.retryAfter;
    if (err instanceof RateLimitError && typeof retryAfter === 'number') {
      headers['Retry-After'] = String(retryAfter);
    }

    sendError(res, err.statusCode, err.code, err.message, { details: err.details, headers });
    return;
  }

  // Unknown error, don't leak internals
  sendError(res, 500, 'INTERNAL_ERROR', 'An unexpected error occurred');
}
