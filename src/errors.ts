/**
 * Error hierarchy.
 *
 * AppError subclasses surface to HTTP callers with their status code.
 * CoreFailure subclasses never leave the router: each component catches
 * its own failure, logs it and substitutes a degraded value.
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

export class UnauthorizedError extends AppError {
  constructor(message = 'Missing or invalid API key') {
    super('UNAUTHORIZED', message, 401);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super('NOT_FOUND', `${resource} ${id} not found`, 404);
  }
}

/** The caller abandoned the request before a response was built. */
export class RequestCancelledError extends AppError {
  constructor(requestId: string) {
    super('CANCELLED', `Request ${requestId} was cancelled`, 499);
  }
}

// ── Non-fatal core failures ──

export type CoreFailureKind = 'retrieval' | 'handler' | 'store' | 'enqueue';

export abstract class CoreFailure extends Error {
  abstract readonly kind: CoreFailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RetrievalFailure extends CoreFailure {
  readonly kind = 'retrieval';
}

export class HandlerFailure extends CoreFailure {
  readonly kind = 'handler';
}

export class StoreFailure extends CoreFailure {
  readonly kind = 'store';
}

export class EnqueueFailure extends CoreFailure {
  readonly kind = 'enqueue';
}

/** Invalid configuration detected at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
