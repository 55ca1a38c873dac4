import { describe, it, expect } from 'vitest';
import { AbortedError, TimeoutError, timeoutSignal, withTimeout } from '../../src/utils/async.js';

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(delay(5, 'done'), 100)).resolves.toBe('done');
  });

  it('should reject with TimeoutError naming the context', async () => {
    const result = withTimeout(delay(200, 'late'), 10, { context: 'knowledge retrieval' });

    await expect(result).rejects.toThrow(TimeoutError);
    await expect(withTimeout(delay(200, 'late'), 10, { context: 'knowledge retrieval' })).rejects.toThrow(
      'Timeout after 10ms: knowledge retrieval'
    );
  });

  it('should use a generic message without context', async () => {
    await expect(withTimeout(delay(200, 'late'), 5)).rejects.toThrow('Operation timed out after 5ms');
  });

  it('should pass through rejections of the wrapped promise', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100)).rejects.toThrow('boom');
  });

  it('should reject immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      withTimeout(delay(5, 'x'), 100, { signal: controller.signal, context: 'handler generic' })
    ).rejects.toThrow(new AbortedError('handler generic'));
  });

  it('should reject when the signal aborts mid-flight', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 5);

    await expect(withTimeout(delay(200, 'x'), 1000, { signal: controller.signal })).rejects.toThrow(
      'Operation aborted'
    );
  });

  it('should not time out when timeoutMs is not positive', async () => {
    await expect(withTimeout(delay(10, 'ok'), 0)).resolves.toBe('ok');
  });
});

describe('timeoutSignal', () => {
  it('should abort after the timeout', async () => {
    const signal = timeoutSignal(5);
    expect(signal.aborted).toBe(false);

    await delay(30, null);

    expect(signal.aborted).toBe(true);
  });

  it('should abort when the caller signal aborts', () => {
    const controller = new AbortController();
    const signal = timeoutSignal(10_000, controller.signal);

    controller.abort();

    expect(signal.aborted).toBe(true);
  });
});
