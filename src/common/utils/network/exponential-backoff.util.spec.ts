import { afterEach, describe, expect, it, vi } from 'vitest';

import { computeBackoffDelayMs, executeWithExponentialBackoff } from './exponential-backoff.util';

class TransientError extends Error {}

describe('executeWithExponentialBackoff', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns first successful result without retry callbacks', async (): Promise<void> => {
    const operation = vi.fn(async (): Promise<string> => 'ok');
    const onRetry = vi.fn();

    const result: string = await executeWithExponentialBackoff(operation, {
      shouldRetry: (): boolean => true,
      onRetry,
    });

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledWith(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('retries retryable errors after the base delay', async (): Promise<void> => {
    vi.useFakeTimers();
    const operation = vi
      .fn<(attempt: number) => Promise<number>>()
      .mockRejectedValueOnce(new TransientError('reset'))
      .mockResolvedValueOnce(42);
    const onRetry = vi.fn();

    const resultPromise: Promise<number> = executeWithExponentialBackoff(operation, {
      maxAttempts: 2,
      baseDelayMs: 200,
      maxDelayMs: 1000,
      shouldRetry: (error: unknown): boolean => error instanceof TransientError,
      onRetry,
    });

    await vi.advanceTimersByTimeAsync(199);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);

    await expect(resultPromise).resolves.toBe(42);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(TransientError), 1, 200);
  });

  it('rethrows non-retryable errors immediately', async (): Promise<void> => {
    const failure: Error = new Error('bad shape');
    const operation = vi.fn(async (): Promise<never> => {
      throw failure;
    });

    await expect(
      executeWithExponentialBackoff(operation, {
        maxAttempts: 3,
        shouldRetry: (error: unknown): boolean => error instanceof TransientError,
      }),
    ).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rethrows last error once attempts are exhausted', async (): Promise<void> => {
    vi.useFakeTimers();
    const operation = vi.fn(async (attempt: number): Promise<never> => {
      throw new TransientError(`attempt ${String(attempt)}`);
    });

    const resultPromise: Promise<never> = executeWithExponentialBackoff(operation, {
      maxAttempts: 2,
      baseDelayMs: 100,
      shouldRetry: (): boolean => true,
    });
    const assertion: Promise<void> = expect(resultPromise).rejects.toThrow('attempt 2');

    await vi.advanceTimersByTimeAsync(100);
    await assertion;
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe('computeBackoffDelayMs', (): void => {
  it('doubles per attempt and caps at max delay', (): void => {
    expect(computeBackoffDelayMs(1, 500, 3000)).toBe(500);
    expect(computeBackoffDelayMs(2, 500, 3000)).toBe(1000);
    expect(computeBackoffDelayMs(3, 500, 3000)).toBe(2000);
    expect(computeBackoffDelayMs(4, 500, 3000)).toBe(3000);
  });
});
