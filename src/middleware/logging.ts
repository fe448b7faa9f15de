/**
 * Request logging middleware.
 * Captures method, path, status, duration, request id and the classification
 * source header for every request.
 *
 * Level mapping:
 *   2xx → info (warn when the answer came from the fallback path)
 *   4xx → warn
 *   5xx → error
 *   handler exception → error (re-thrown)
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

export const SOURCE_HEADER = 'X-Classification-Source';

function levelFor(status: number, source: string | null): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return source === 'fallback' ? 'warn' : 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const method = req.method;
      const path = new URL(req.url).pathname;
      const start = performance.now();

      try {
        const response = await next(req, ctx);
        const durationMs = Math.round(performance.now() - start);
        const status = response.status;
        const source = response.headers.get(SOURCE_HEADER);

        const event: RequestLogEvent = {
          level: levelFor(status, source),
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          requestId: ctx.requestId,
          ...(source ? { source } : {}),
        };

        logProvider.log(event);
        return response;
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);

        const event: RequestLogEvent = {
          level: 'error',
          message: `${method} ${path} → 500 (${durationMs}ms)`,
          method,
          path,
          status: 500,
          durationMs,
          requestId: ctx.requestId,
          fields: {
            error: err instanceof Error ? err.message : String(err),
          },
        };

        logProvider.log(event);
        throw err;
      }
    };
  };
}
