/**
 * Request logging middleware.
 * Captures method, path, status, duration and request ID for every request.
 * Logs are sent to the configured ILogProvider.
 *
 * Level mapping:
 *   2xx/3xx → info
 *   4xx → warn
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Context } from '../context/context.js';
import { requestPath } from '../http/request.js';
import { handlerFunc, type Constructor } from './handler.js';
import { requestIdKey } from './request-id.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

function contextFields(ctx: Context): Pick<RequestLogEvent, 'requestId'> {
  const id = ctx.value(requestIdKey);
  return id ? { requestId: id } : {};
}

export function createLoggingMiddleware(logProvider: ILogProvider): Constructor {
  return (next) =>
    handlerFunc(async (ctx, req, res) => {
      const method = req.method ?? 'GET';
      const path = requestPath(req);
      const start = performance.now();

      try {
        await next.serve(ctx, req, res);
        const durationMs = Math.round(performance.now() - start);
        const status = res.statusCode;

        const event: RequestLogEvent = {
          level: levelForStatus(status),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          ...contextFields(ctx),
        };

        logProvider.log(event);
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: RequestLogEvent = {
          level: 'error',
          message: `${method} ${path} → 500 (${durationMs}ms)`,
          method,
          path,
          status: 500,
          durationMs,
          fields: {
            error: err instanceof Error ? err.message : String(err),
          },
          ...contextFields(ctx),
        };

        logProvider.log(event);
        throw err;
      }
    });
}
