const DEFAULT_MAX_ATTEMPTS = 2;
const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 5000;
const BACKOFF_MULTIPLIER = 2;

export interface IExponentialBackoffOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly shouldRetry: (error: unknown, attempt: number) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const sleep = async (delayMs: number): Promise<void> => {
  if (delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    setTimeout(resolve, delayMs);
  });
};

const resolvePositiveInt = (value: number | undefined, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return fallback;
  }

  return Math.floor(value);
};

export const computeBackoffDelayMs = (
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number => Math.min(baseDelayMs * BACKOFF_MULTIPLIER ** Math.max(0, attempt - 1), maxDelayMs);

/**
 * Runs `operation` until it resolves or `maxAttempts` is spent. Only errors
 * accepted by `shouldRetry` get another attempt; anything else is rethrown as is.
 */
export const executeWithExponentialBackoff = async <TResult>(
  operation: (attempt: number) => Promise<TResult>,
  options: IExponentialBackoffOptions,
): Promise<TResult> => {
  const maxAttempts: number = resolvePositiveInt(options.maxAttempts, DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs: number = resolvePositiveInt(options.baseDelayMs, DEFAULT_BASE_DELAY_MS);
  const maxDelayMs: number = Math.max(
    baseDelayMs,
    resolvePositiveInt(options.maxDelayMs, DEFAULT_MAX_DELAY_MS),
  );

  for (let attempt: number = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error: unknown) {
      const shouldRetry: boolean = attempt < maxAttempts && options.shouldRetry(error, attempt);

      if (!shouldRetry) {
        throw error;
      }

      const delayMs: number = computeBackoffDelayMs(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }

  throw new Error('Unreachable backoff branch');
};
