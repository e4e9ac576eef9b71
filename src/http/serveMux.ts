/**
 * Minimal request multiplexer.
 * Patterns are absolute paths: "/healthz" matches exactly, "/static/" matches
 * its whole subtree. Exact matches win, then the longest subtree pattern.
 * Unmatched requests get a plain-text 404.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { TransportHandler } from '../middleware/handler.js';
import { requestPath } from './request.js';

export function notFound(_req: IncomingMessage, res: ServerResponse): void {
  res.statusCode = 404;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.end('404 page not found\n');
}

export class ServeMux {
  private readonly exact = new Map<string, TransportHandler>();
  private readonly subtrees = new Map<string, TransportHandler>();

  handle(pattern: string, listener: TransportHandler): void {
    if (!pattern.startsWith('/')) {
      throw new Error(`serve_mux.invalid_pattern: ${JSON.stringify(pattern)}`);
    }

    const table = pattern.endsWith('/') ? this.subtrees : this.exact;
    if (table.has(pattern)) {
      throw new Error(`serve_mux.duplicate_pattern: ${pattern}`);
    }
    table.set(pattern, listener);
  }

  /** The listener registered for `path`, or null. */
  match(path: string): TransportHandler | null {
    const exact = this.exact.get(path);
    if (exact) return exact;

    let best: string | null = null;
    for (const prefix of this.subtrees.keys()) {
      if (path.startsWith(prefix) && (best === null || prefix.length > best.length)) {
        best = prefix;
      }
    }
    return best === null ? null : this.subtrees.get(best) ?? null;
  }

  readonly serve: TransportHandler = (req, res) => {
    const listener = this.match(requestPath(req)) ?? notFound;
    return listener(req, res);
  };
}

/** Process-wide multiplexer; the terminal handler of a chain composed without one. */
export const defaultServeMux = new ServeMux();
