/**
 * Request body size limit.
 * Rejects bodies larger than maxBytes with 413, using Content-Length when
 * present and the actual body size otherwise.
 */

import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function bodyLimit(maxBytes: number): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      if (req.method === 'GET' || req.method === 'HEAD' || req.method === 'OPTIONS') {
        return next(req, ctx);
      }

      const declared = Number(req.headers.get('Content-Length'));
      if (Number.isFinite(declared) && declared > maxBytes) {
        return tooLarge(maxBytes);
      }

      const body = await req.arrayBuffer();
      if (body.byteLength > maxBytes) {
        return tooLarge(maxBytes);
      }

      // Body was consumed above; hand the handler a fresh request
      const newReq = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        signal: req.signal,
        body: body.byteLength > 0 ? body : null,
      });

      return next(newReq, ctx);
    };
  };
}

function tooLarge(maxBytes: number): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'PAYLOAD_TOO_LARGE',
        message: `Request body must be ${maxBytes} bytes or less`,
      },
    }),
    { status: 413, headers: JSON_HEADERS }
  );
}
