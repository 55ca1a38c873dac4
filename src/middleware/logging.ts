/**
 * Request logging middleware.
 * One event per request: 2xx at info, 4xx at warn, 5xx and handler
 * exceptions at error. Requests the client abandoned are marked `cancelled`.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';
import { describeError } from '../errors.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const start = performance.now();
      const emit = (status: number, level: LogLevel, fields: Record<string, unknown>) =>
        logProvider.log(requestEvent(req, ctx, status, level, performance.now() - start, fields));

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        emit(500, 'error', { error: describeError(err) });
        throw err;
      }

      emit(response.status, levelForStatus(response.status), {});
      return response;
    };
  };
}

function requestEvent(
  req: Request,
  ctx: HandlerContext,
  status: number,
  level: LogLevel,
  elapsedMs: number,
  fields: Record<string, unknown>
): RequestLogEvent {
  const method = req.method;
  const path = new URL(req.url).pathname;
  const durationMs = Math.round(elapsedMs);
  const allFields = req.signal.aborted ? { ...fields, cancelled: true } : fields;

  return {
    level,
    message: `${method} ${path} → ${status} (${durationMs}ms)`,
    method,
    path,
    status,
    durationMs,
    ...(ctx.clientId ? { clientId: ctx.clientId } : {}),
    ...(Object.keys(allFields).length > 0 ? { fields: allFields } : {}),
  };
}
