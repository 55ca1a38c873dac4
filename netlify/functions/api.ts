/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

export default async (req: Request, context: Context) => {
  // Container is created once per cold start (shared across warm invocations)
  const container = getProductionContainer();
  const router = createRouter(container);

  const response = await router.handle(req, { clientId: null });

  // Background repairs and buffered logs finish after the response is sent
  const settle = container.queryRouter.drain().then(() => container.logProvider.flush());
  if ('waitUntil' in context && typeof context.waitUntil === 'function') {
    context.waitUntil(settle);
  } else {
    await settle;
  }

  return response;
};

export const config = {
  path: '/api/v1/*',
};
