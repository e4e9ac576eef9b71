/**
 * Request ID middleware.
 * Reuses the caller's X-Request-Id when present, otherwise generates one.
 * The ID is bound to the context and echoed on the response.
 */

import { randomUUID } from 'node:crypto';
import { createContextKey, withValue } from '../context/context.js';
import { headerValue } from '../http/request.js';
import { handlerFunc, type Constructor } from './handler.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';
const MAX_REQUEST_ID_LENGTH = 128;

export const requestIdKey = createContextKey<string>('requestId');

export function requestId(generate: () => string = randomUUID): Constructor {
  return (next) =>
    handlerFunc((ctx, req, res) => {
      const incoming = headerValue(req, REQUEST_ID_HEADER);
      const id =
        incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : generate();

      res.setHeader(REQUEST_ID_HEADER, id);
      return next.serve(withValue(ctx, requestIdKey, id), req, res);
    });
}
