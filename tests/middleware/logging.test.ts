import { describe, it, expect, beforeEach } from 'vitest';
import { createLoggingMiddleware } from '../../src/middleware/logging.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { RequestLogEvent } from '../../src/providers/ILogProvider.js';
import { handlerFunc, type Handler } from '../../src/middleware/handler.js';
import { requestIdKey } from '../../src/middleware/request-id.js';
import { principalKey } from '../../src/middleware/authenticate.js';
import { background, withValue, type Context } from '../../src/context/context.js';
import { exchange } from '../helpers/http.js';

function respondWith(status: number): Handler {
  return handlerFunc((_ctx, _req, res) => {
    res.statusCode = status;
    res.end();
  });
}

describe('logging middleware', () => {
  let logProvider: ConsoleLogProvider;
  let middleware: ReturnType<typeof createLoggingMiddleware>;

  beforeEach(() => {
    logProvider = new ConsoleLogProvider();
    middleware = createLoggingMiddleware(logProvider);
  });

  async function serve(
    handler: Handler,
    method: string,
    url: string,
    ctx: Context = background()
  ) {
    const ex = exchange(method, url);
    await middleware(handler).serve(ctx, ex.req, ex.res);
    return ex;
  }

  function lastEvent(): RequestLogEvent {
    const event = logProvider.events.at(-1);
    if (!event || !('status' in event)) throw new Error('no request event logged');
    return event as RequestLogEvent;
  }

  // --- basic request logging ---

  it('should log a successful request', async () => {
    await serve(respondWith(200), 'GET', '/api/v1/stats');

    expect(logProvider.events).toHaveLength(1);
    const event = lastEvent();
    expect(event.level).toBe('info');
    expect(event.method).toBe('GET');
    expect(event.path).toBe('/api/v1/stats');
    expect(event.status).toBe(200);
    expect(event.durationMs).toBeGreaterThanOrEqual(0);
    expect(event.message).toBe(`GET /api/v1/stats → 200 (${event.durationMs}ms)`);
  });

  it('should pass the response through unmodified', async () => {
    const handler = handlerFunc((_ctx, _req, res) => {
      res.statusCode = 201;
      res.setHeader('X-Custom', 'yes');
      res.end('created');
    });

    const { res, body } = await serve(handler, 'POST', '/api/v1/items');

    expect(res.statusCode).toBe(201);
    expect(res.getHeader('X-Custom')).toBe('yes');
    expect(body()).toBe('created');
  });

  // --- context ---

  it('should include the request ID bound by an outer middleware', async () => {
    const ctx = withValue(background(), requestIdKey, 'req-123');

    await serve(respondWith(200), 'GET', '/api/v1/stats', ctx);

    expect(lastEvent().requestId).toBe('req-123');
  });

  it('should omit requestId when none is bound', async () => {
    await serve(respondWith(200), 'GET', '/api/v1/stats');

    expect(lastEvent().requestId).toBeUndefined();
  });

  // --- level mapping ---

  it('should log 4xx responses at warn level', async () => {
    await serve(respondWith(404), 'GET', '/api/v1/items/bad');

    expect(lastEvent().level).toBe('warn');
    expect(lastEvent().status).toBe(404);
  });

  it('should log 5xx responses at error level', async () => {
    await serve(respondWith(503), 'POST', '/api/v1/query');

    expect(lastEvent().level).toBe('error');
  });

  it('should log 3xx responses at info level', async () => {
    await serve(respondWith(302), 'GET', '/old');

    expect(lastEvent().level).toBe('info');
  });

  // --- duration tracking ---

  it('should measure request duration', async () => {
    const slow = handlerFunc(async (_ctx, _req, res) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      res.end();
    });

    await serve(slow, 'GET', '/api/v1/stats');

    expect(lastEvent().durationMs).toBeGreaterThanOrEqual(15); // allow small timing variance
  });

  // --- handler exceptions ---

  it('should log and re-throw if the handler throws', async () => {
    const failing = handlerFunc(() => {
      throw new Error('boom');
    });
    const ex = exchange('POST', '/api/v1/query');

    await expect(middleware(failing).serve(background(), ex.req, ex.res)).rejects.toThrow('boom');

    expect(logProvider.events).toHaveLength(1);
    const event = lastEvent();
    expect(event.level).toBe('error');
    expect(event.status).toBe(500);
    expect(event.message).toBe(`POST /api/v1/query → 500 (${event.durationMs}ms)`);
    expect(event.fields).toEqual({ error: 'boom' });
  });

  it('should log the path without query parameters', async () => {
    await serve(respondWith(200), 'GET', '/api/v1/stats?foo=bar&baz=1');

    expect(lastEvent().path).toBe('/api/v1/stats');
  });

  it('should not record a principal bound by an inner middleware', async () => {
    const inner = handlerFunc((ctx, req, res) =>
      respondWith(200).serve(withValue(ctx, principalKey, { id: 'agent-1' }), req, res)
    );

    await serve(inner, 'GET', '/api/v1/stats');

    expect(Object.keys(lastEvent()).sort()).toEqual([
      'durationMs',
      'level',
      'message',
      'method',
      'path',
      'status',
      'timestamp',
    ]);
  });
});
