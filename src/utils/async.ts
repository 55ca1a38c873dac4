/**
 * Async helpers for bounding external calls.
 */

export class TimeoutError extends Error {
  constructor(
    readonly timeoutMs: number,
    context?: string
  ) {
    super(
      context
        ? `Timeout after ${timeoutMs}ms: ${context}`
        : `Operation timed out after ${timeoutMs}ms`
    );
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(context?: string) {
    super(context ? `Aborted: ${context}` : 'Operation aborted');
    this.name = 'AbortedError';
  }
}

export interface WithTimeoutOptions {
  /** Included in the error message. */
  context?: string;
  /** Rejects early with AbortedError when this signal fires. */
  signal?: AbortSignal;
}

/**
 * Race a promise against a timer (and optionally an abort signal).
 * The underlying operation is not cancelled; callers that can cancel
 * should also pass the signal down.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  options?: WithTimeoutOptions
): Promise<T> {
  const signal = options?.signal;
  if (signal?.aborted) {
    throw new AbortedError(options?.context);
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  let onAbort: (() => void) | null = null;

  const guards = new Promise<never>((_, reject) => {
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        reject(new TimeoutError(timeoutMs, options?.context));
      }, timeoutMs);
    }
    if (signal) {
      onAbort = () => reject(new AbortedError(options?.context));
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, guards]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}

/** Combine a caller signal with a timeout into one signal for fetch-style APIs. */
export function timeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
