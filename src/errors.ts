/**
 * Error hierarchy.
 * AppError subclasses carry an HTTP status and an API error code and are
 * mapped to JSON responses by the error handler middleware.
 * RemoteError and TemplateError never reach a caller as-is.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

/**
 * Hard precondition violation on a feedback submission
 * (oversized text, unusable timestamp). Returned, not thrown, by the intake
 * service; the HTTP layer throws it so it renders as a 400.
 */
export class InputError extends ValidationError {
  constructor(
    readonly reason: 'text_too_long' | 'invalid_timestamp',
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, { reason, ...details });
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super('NOT_FOUND', message, 404);
  }
}

export class RateLimitError extends AppError {
  constructor(retryAfter: number) {
    super('RATE_LIMITED', 'Rate limit exceeded', 429, { retryAfter });
  }
}

// ── Remote provider failures ──

export type RemoteErrorKind =
  | 'Unauthorized'
  | 'RateLimited'
  | 'Timeout'
  | 'MalformedResponse'
  | 'NetworkError';

/** Failure of a call to the remote AI endpoint. Always recovered by a fallback. */
export class RemoteError extends Error {
  constructor(
    readonly kind: RemoteErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemoteError';
  }

  /** Kinds worth one more attempt after a short pause. */
  get transient(): boolean {
    return this.kind === 'RateLimited' || this.kind === 'NetworkError';
  }
}

/** Anything thrown by a remote attempt, as a RemoteError. */
export function toRemoteError(err: unknown): RemoteError {
  if (err instanceof RemoteError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new RemoteError('NetworkError', message, { cause: err });
}

/** A prompt or guidance template that does not match its declared slots. */
export class TemplateError extends Error {
  constructor(
    readonly template: string,
    message: string
  ) {
    super(`Template "${template}": ${message}`);
    this.name = 'TemplateError';
  }
}
