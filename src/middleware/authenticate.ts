/**
 * Authentication middleware for admin routes.
 * Accepts a Bearer token from the configured admin key list and sets a
 * stable, non-secret client id on the context.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createAuthMiddleware(adminKeys: readonly string[]): Middleware {
  const digests = adminKeys.filter((k) => k.length > 0).map(digest);

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <api_key>');
      }

      const apiKey = authHeader.slice(7).trim();

      if (!apiKey) {
        return unauthorized('API key is empty');
      }

      const presented = digest(apiKey);
      if (!digests.some((d) => timingSafeEqual(d, presented))) {
        return unauthorized('Invalid API key');
      }

      ctx.clientId = clientIdFor(apiKey);
      return next(req, ctx);
    };
  };
}

/** Short, log-safe identifier for an API key. */
export function clientIdFor(apiKey: string): string {
  return `admin-${digest(apiKey).toString('hex').slice(0, 8)}`;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'UNAUTHORIZED',
        message,
      },
    }),
    { status: 401, headers: JSON_HEADERS }
  );
}
