/**
 * Fixed-window request counter used by the rate limit middleware.
 */

export interface RateLimitHit {
  /** Requests counted in the current window, including this one. */
  count: number;
  /** Unix time (seconds) at which the window resets. */
  resetAt: number;
}

export interface IRateLimitStore {
  increment(key: string, windowSeconds: number): Promise<RateLimitHit>;
}
