/**
 * Rate limiting middleware.
 * Composable with the pipeline: each endpoint can have its own config.
 * Counts live in an IRateLimitStore.
 */

import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import type { HandlerContext, Middleware, Handler } from './pipeline.js';
import { RateLimitError } from '../errors.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: Request, ctx: HandlerContext) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        const now = Math.floor(Date.now() / 1000);
        throw new RateLimitError(Math.max(1, resetAt - now));
      }

      const response = await next(req, ctx);

      const headers = new Headers(response.headers);
      headers.set('X-RateLimit-Limit', String(config.limit));
      headers.set('X-RateLimit-Remaining', String(Math.max(0, config.limit - count)));
      headers.set('X-RateLimit-Reset', String(resetAt));

      return new Response(response.body, {
        status: response.status,
        statusText: response.statusText,
        headers,
      });
    };
  };
}

/** Client IP key, from the first X-Forwarded-For hop. */
export function ipKey(action: string) {
  return (req: Request): string => {
    const forwarded = req.headers.get('X-Forwarded-For');
    const ip = forwarded?.split(',')[0]?.trim() || 'unknown';
    return `ip:${ip}:${action}`;
  };
}

const ONE_HOUR = 3600;

export const RATE_LIMITS = {
  /** POST /feedback: each submission may cost two remote calls */
  submitFeedback: { key: ipKey('feedback'), limit: 30, windowSeconds: ONE_HOUR },
  /** PUT /feedback/:id: status changes by officials */
  updateStatus: { key: ipKey('status'), limit: 300, windowSeconds: ONE_HOUR },
  /** POST and GET /summaries */
  summaries: { key: ipKey('summaries'), limit: 60, windowSeconds: ONE_HOUR },
} as const satisfies Record<string, RateLimitConfig>;
