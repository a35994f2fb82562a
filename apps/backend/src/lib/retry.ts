export interface RetryOptions {
  /** Total attempts including the first one */
  attempts?: number;
  /** Wait after failed attempt `n` is `n * stepMs` */
  stepMs?: number;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryExhaustedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`);
    this.name = 'RetryExhaustedError';
  }
}

export const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Run `fn` until it resolves or the attempt budget is spent.
 *
 * Backoff is linear: 1×, 2×, 3×… `stepMs`. There is no wait after the last
 * attempt.
 *
 * @throws RetryExhaustedError carrying the last failure
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    attempts = 3,
    stepMs = 500,
    onRetry,
    sleep: wait = sleep
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts) {
        break;
      }
      const delayMs = attempt * stepMs;
      onRetry?.(attempt, error, delayMs);
      await wait(delayMs);
    }
  }

  throw new RetryExhaustedError(attempts, lastError);
}
