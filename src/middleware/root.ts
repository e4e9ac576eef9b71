/**
 * Root boundary between the transport and the context-aware chain.
 * Every request gets a fresh cancellable context derived from background(),
 * cancelled once the chain finishes however it exits.
 */

import { background, withCancel } from '../context/context.js';
import type { Handler, TransportHandler } from './handler.js';

export function createRootHandler(handler: Handler): TransportHandler {
  return (req, res) => {
    const [ctx, cancel] = withCancel(background());
    let settlesLater = false;

    try {
      const result = handler.serve(ctx, req, res);
      if (result instanceof Promise) {
        settlesLater = true;
        return result.finally(cancel);
      }
    } finally {
      if (!settlesLater) cancel();
    }
  };
}
