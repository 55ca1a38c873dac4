/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; unknown errors become 500
 * and go to the log provider.
 */

import { AppError, describeError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function errorHandler(logProvider?: ILogProvider): Middleware {
  return (next: Handler): Handler => async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };

        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers: JSON_HEADERS,
        });
      }

      // Unknown error: don't leak internals
      logProvider?.error('Unhandled error', {
        path: new URL(req.url).pathname,
        error: describeError(err),
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
}
