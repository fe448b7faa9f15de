/**
 * Process-local rate limit store.
 * Counts are per instance; a cold start begins from zero.
 */

import type { IRateLimitStore, RateLimitHit } from './IRateLimitStore.js';

export class InMemoryRateLimitStore implements IRateLimitStore {
  private windows = new Map<string, RateLimitHit>();

  async increment(key: string, windowSeconds: number): Promise<RateLimitHit> {
    const now = Math.floor(Date.now() / 1000);
    const current = this.windows.get(key);

    if (!current || current.resetAt <= now) {
      const fresh = { count: 1, resetAt: now + windowSeconds };
      this.windows.set(key, fresh);
      this.prune(now);
      return { ...fresh };
    }

    current.count++;
    return { ...current };
  }

  /** Drop expired windows so the map does not grow without bound. */
  private prune(now: number): void {
    for (const [key, hit] of this.windows) {
      if (hit.resetAt <= now) this.windows.delete(key);
    }
  }
}
