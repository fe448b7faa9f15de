export { pipeline } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { createErrorHandler, appErrorResponse } from './error-handler.js';
export { validateBody } from './validate-body.js';
export { createRateLimitMiddleware, ipKey, RATE_LIMITS } from './rate-limit.js';
export type { RateLimitConfig } from './rate-limit.js';
export { createLoggingMiddleware, SOURCE_HEADER } from './logging.js';
