/**
 * Composable middleware chain for node:http servers.
 * Middleware wraps handlers in order (left to right), forming an onion model,
 * and the composed handler runs inside a per-request context boundary.
 */

import { defaultServeMux } from '../http/serveMux.js';
import {
  adaptTransport,
  handlerFunc,
  type Constructor,
  type Handler,
  type HandlerFunc,
  type TransportHandler,
} from './handler.js';
import { createRootHandler } from './root.js';

/**
 * Compose constructors into a function that wraps a handler.
 * Constructors are applied left-to-right:
 *   pipeline(auth, rateLimit)(handler)
 *   → auth wraps (rateLimit wraps handler)
 */
export function pipeline(...constructors: Constructor[]) {
  return (handler: Handler): Handler => {
    return constructors.reduceRight<Handler>((next, construct) => construct(next), handler);
  };
}

/**
 * An immutable list of middleware constructors.
 * Once created, a Chain always holds the same constructors in the same order;
 * append() returns a new Chain.
 */
export class Chain {
  readonly constructors: readonly Constructor[];

  private readonly finalize: (handler: Handler) => TransportHandler;

  private constructor(constructors: readonly Constructor[]) {
    this.constructors = Object.freeze([...constructors]);
    this.finalize = createRootHandler;
  }

  /** Constructors are not called until handle()/handleFunc(). */
  static of(...constructors: Constructor[]): Chain {
    return new Chain(constructors);
  }

  /**
   * Chain the middleware around `handler` and return the transport handler.
   *   createChain(m1, m2, m3).handle(h)
   * is equivalent to the root boundary around m1(m2(m3(h))).
   *
   * A Chain can be reused by calling handle() several times. Constructors run on
   * every call, so each call builds its own middleware instances.
   *
   * A missing handler is treated as defaultServeMux.
   */
  handle(handler?: Handler | null): TransportHandler {
    const terminal = handler ?? adaptTransport(defaultServeMux.serve);
    return this.finalize(pipeline(...this.constructors)(terminal));
  }

  /** handle() for a plain function. */
  handleFunc(fn?: HandlerFunc | null): TransportHandler {
    if (!fn) return this.handle(null);
    return this.handle(handlerFunc(fn));
  }

  /** A new Chain with `constructors` added after this chain's own. */
  append(...constructors: Constructor[]): Chain {
    return Chain.of(...this.constructors, ...constructors);
  }
}

export function createChain(...constructors: Constructor[]): Chain {
  return Chain.of(...constructors);
}
