/**
 * Health endpoint.
 * GET /api/v1/health: liveness and registered handlers (no auth)
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';

export function createHealthHandlers(container: Container) {
  const check: Handler = pipeline(container.errorHandler)(async (_req, _ctx) => {
    const body = {
      status: 'ok',
      handlers: container.handlers.keys().sort(),
      pendingRepairs: container.queryRouter.pendingTasks,
    };

    return new Response(JSON.stringify(body), {
      status: 200,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'no-store',
      },
    });
  });

  return { check };
}
