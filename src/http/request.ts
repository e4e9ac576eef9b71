import type { IncomingMessage } from 'node:http';

/**
 * Path of the request target without the query string. Runs of slashes are
 * collapsed, so "//admin/x" is "/admin/x" rather than host "admin".
 * Absolute-form targets ("http://host/path") keep only their path.
 */
export function requestPath(req: IncomingMessage): string {
  let target = req.url ?? '/';
  if (!target.startsWith('/')) {
    target = URL.canParse(target) ? new URL(target).pathname : `/${target}`;
  }

  const queryAt = target.indexOf('?');
  const path = queryAt === -1 ? target : target.slice(0, queryAt);
  return path.replace(/\/{2,}/g, '/');
}

/** First value of a request header, trimmed; null when absent or blank. */
export function headerValue(req: IncomingMessage, name: string): string | null {
  const raw = req.headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
