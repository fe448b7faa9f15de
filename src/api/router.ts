/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import { randomUUID } from 'node:crypto';
import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createFeedbackHandlers } from './feedback.js';
import { createSummaryHandlers } from './summaries.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

const REQUEST_ID_HEADER = 'X-Request-Id';

export function createRouter(container: Container) {
  const feedback = createFeedbackHandlers(container);
  const summaries = createSummaryHandlers(container);

  const routes: Route[] = [
    // Feedback
    { method: 'POST', pattern: /^\/api\/v1\/feedback\/?$/, handler: feedback.submit },
    { method: 'PUT', pattern: /^\/api\/v1\/feedback\/[^/]+\/?$/, handler: feedback.updateStatus },

    // Summaries
    { method: 'POST', pattern: /^\/api\/v1\/summaries\/?$/, handler: summaries.summarizeItems },
    { method: 'GET', pattern: /^\/api\/v1\/summaries\/?$/, handler: summaries.summarizeStored },
  ];

  const handle = async (req: Request): Promise<Response> => {
    const url = new URL(req.url);
    const method = req.method;
    const requestId = req.headers.get(REQUEST_ID_HEADER) ?? randomUUID();

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const ctx: HandlerContext = { requestId, body: null };
        const response = await route.handler(req, ctx);
        return addHeaders(response, { [REQUEST_ID_HEADER]: requestId });
      }
    }

    // Path matches but method doesn't
    const allowed = routes.filter((r) => r.pattern.test(url.pathname)).map((r) => r.method);
    if (allowed.length > 0) {
      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed.join(', '),
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, PUT, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type, X-Request-Id',
    'Access-Control-Expose-Headers': 'X-Classification-Source, X-Request-Id, Retry-After',
    'Access-Control-Max-Age': '86400',
  };
}

function addHeaders(response: Response, extra: Record<string, string>): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries({ ...corsHeaders(), ...extra })) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
