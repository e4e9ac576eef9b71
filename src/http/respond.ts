/**
 * Response writers shared by the bundled middleware.
 */

import type { ServerResponse } from 'node:http';
import type { ApiErrorResponse, ErrorCode } from '../types/api.js';

const JSON_CONTENT_TYPE = 'application/json';

export function sendJson(
  res: ServerResponse,
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): void {
  res.statusCode = status;
  res.setHeader('Content-Type', JSON_CONTENT_TYPE);
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  res.end(JSON.stringify(body));
}

export function sendError(
  res: ServerResponse,
  status: number,
  code: ErrorCode,
  message: string,
  options: { details?: Record<string, unknown>; headers?: Record<string, string> } = {}
): void {
  const body: ApiErrorResponse = {
    error: {
      code,
      message,
      ...(options.details && { details: options.details }),
    },
  };
  sendJson(res, status, body, options.headers);
}
