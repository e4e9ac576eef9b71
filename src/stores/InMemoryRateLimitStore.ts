/**
 * Fixed-window rate limit store held in process memory.
 * Counts are per process; use a shared store when running several instances.
 */

import type { IRateLimitStore, RateLimitWindow } from './IRateLimitStore.js';

export class InMemoryRateLimitStore implements IRateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>();
  private lastSweep = 0;

  /** Number of keys currently tracked. */
  get size(): number {
    return this.windows.size;
  }

  async increment(key: string, windowSeconds: number): Promise<RateLimitWindow> {
    const now = Math.floor(Date.now() / 1000);
    this.sweep(now);
    const current = this.windows.get(key);

    if (!current || current.resetAt <= now) {
      const fresh = { count: 1, resetAt: now + windowSeconds };
      this.windows.set(key, fresh);
      return { ...fresh };
    }

    current.count += 1;
    return { ...current };
  }

  // Expired windows are dropped at most once per second
  private sweep(now: number): void {
    if (now === this.lastSweep) return;
    this.lastSweep = now;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }

  /** Drop every counter. Useful between test cases. */
  clear(): void {
    this.windows.clear();
  }
}
