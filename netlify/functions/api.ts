/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

// Container is created once per cold start (shared across warm invocations)
const container = getProductionContainer();
const router = createRouter(container);

export default async (req: Request, _context: Context) => {
  return router.handle(req);
};

export const config = {
  path: '/api/v1/*',
};
