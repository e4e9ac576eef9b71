export interface RateLimitWindow {
  /** Requests counted in the current window, including this one. */
  count: number;
  /** Unix time (seconds) at which the window resets. */
  resetAt: number;
}

export interface IRateLimitStore {
  /** Count one request against `key` in a fixed window of `windowSeconds`. */
  increment(key: string, windowSeconds: number): Promise<RateLimitWindow>;
}
