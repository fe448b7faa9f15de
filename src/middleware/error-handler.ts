/**
 * Error handler middleware.
 * Maps thrown errors to structured JSON responses. AppError subclasses keep
 * their status code and details; anything else is logged and becomes a 500
 * without internals in the body.
 */

import { AppError, RateLimitError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createErrorHandler(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          return appErrorResponse(err);
        }

        logProvider.error('unhandled error', {
          requestId: ctx.requestId,
          error: err instanceof Error ? err.message : String(err),
          stack: err instanceof Error ? err.stack : undefined,
        });

        const body: ApiErrorResponse = {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        };

        return new Response(JSON.stringify(body), {
          status: 500,
          headers: JSON_HEADERS,
        });
      }
    };
  };
}

export function appErrorResponse(err: AppError): Response {
  const body: ApiErrorResponse = {
    error: {
      code: err.code,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    },
  };

  const headers: Record<string, string> = { ...JSON_HEADERS };
  const retryAfter = err.details?.retryAfter;
  if (err instanceof RateLimitError && typeof retryAfter === 'number') {
    headers['Retry-After'] = String(retryAfter);
  }

  return new Response(JSON.stringify(body), {
    status: err.statusCode,
    headers,
  });
}
