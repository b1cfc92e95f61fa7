import { toError } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each further failure. */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay. */
  maxDelayMs?: number;
  /** Whether this error is worth another attempt. Defaults to always. */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  /** Checked before every attempt after the first; `false` stops retrying. */
  canStartAttempt?: () => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Injected in tests to skip real waiting. */
  sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 8_000): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Run `fn` until it succeeds or the attempt budget is spent, with exponential
 * backoff between attempts.
 *
 * `fn` receives the 1-based attempt number and the previous attempt's error so
 * callers can reformulate.
 *
 * @throws The last error once retries are exhausted, refused by `shouldRetry`,
 *   or cut off by `canStartAttempt`.
 */
export async function withRetry<T>(
  fn: (attempt: number, previousError: Error | null) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs,
    maxDelayMs,
    shouldRetry = () => true,
    canStartAttempt = () => true,
    onRetry,
    sleep = defaultSleep,
  } = options;

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1 && !canStartAttempt()) break;

    try {
      return await fn(attempt, lastError);
    } catch (err) {
      lastError = toError(err);

      if (attempt >= maxAttempts || !shouldRetry(lastError, attempt)) break;

      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry?.(attempt, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  throw lastError ?? new Error('withRetry: no attempt was made');
}

/** Race `promise` against a timer; the timer is always cleared. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
