import { describe, it, expect } from 'vitest';
import { createRootHandler } from '../../src/middleware/root.js';
import { handlerFunc } from '../../src/middleware/handler.js';
import { createChain } from '../../src/middleware/pipeline.js';
import { background, type Context } from '../../src/context/context.js';
import { ContextCanceledError } from '../../src/errors.js';
import { exchange } from '../helpers/http.js';

describe('createRootHandler', () => {
  function capturing(onServe: (ctx: Context) => void = () => {}) {
    const seen: Context[] = [];
    const handler = handlerFunc((ctx) => {
      seen.push(ctx);
      expect(ctx.done).toBe(false);
      onServe(ctx);
    });
    return { seen, handler };
  }

  it('should serve with a live context derived from background', () => {
    const { seen, handler } = capturing();
    const { req, res } = exchange();

    createRootHandler(handler)(req, res);

    expect(seen).toHaveLength(1);
    expect(seen[0].parent).toBe(background());
  });

  it('should cancel the context after a normal return', () => {
    const { seen, handler } = capturing();
    const { req, res } = exchange();

    createRootHandler(handler)(req, res);

    expect(seen[0].done).toBe(true);
    expect(seen[0].err()).toBeInstanceOf(ContextCanceledError);
  });

  it('should cancel the context and rethrow when the handler throws', () => {
    const { seen, handler } = capturing(() => {
      throw new Error('boom');
    });
    const { req, res } = exchange();

    expect(() => createRootHandler(handler)(req, res)).toThrow('boom');
    expect(seen[0].done).toBe(true);
  });

  it('should keep the context live until an async handler settles', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const seen: Context[] = [];

    const handler = handlerFunc(async (ctx) => {
      seen.push(ctx);
      await gate;
    });
    const { req, res } = exchange();

    const pending = createRootHandler(handler)(req, res);
    expect(seen).toHaveLength(1);
    expect(seen[0].done).toBe(false);

    release();
    await pending;

    expect(seen[0].done).toBe(true);
  });

  it('should cancel the context and propagate when an async handler rejects', async () => {
    const seen: Context[] = [];
    const handler = handlerFunc(async (ctx) => {
      seen.push(ctx);
      await Promise.resolve();
      throw new Error('async boom');
    });
    const { req, res } = exchange();

    await expect(createRootHandler(handler)(req, res)).rejects.toThrow('async boom');
    expect(seen[0].done).toBe(true);
  });

  it('should create a fresh context for every request', () => {
    const { seen, handler } = capturing();
    const final = createRootHandler(handler);

    const a = exchange();
    final(a.req, a.res);
    const b = exchange();
    final(b.req, b.res);

    expect(seen).toHaveLength(2);
    expect(seen[0]).not.toBe(seen[1]);
  });

  it('should cancel only after the whole chain has run', () => {
    const states: boolean[] = [];
    const contexts: Context[] = [];
    const observe = handlerFunc((ctx) => {
      states.push(ctx.done);
    });

    const final = createChain((next) =>
      handlerFunc((ctx, req, res) => {
        contexts.push(ctx);
        next.serve(ctx, req, res);
        states.push(ctx.done);
      })
    ).handle(observe);
    const { req, res } = exchange();

    final(req, res);

    expect(states).toEqual([false, false]);
    expect(contexts[0].done).toBe(true);
  });
});
