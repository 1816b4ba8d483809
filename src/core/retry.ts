import { RetryExhaustedError, TransientDependencyFailure } from './errors';

export interface RetryAttempt {
  /** The attempt that just failed (1-based). */
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  backoffFactor: number;
  isTransient?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: RetryAttempt) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffFactor: 2,
};

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isTransientFailure(error: unknown): boolean {
  return error instanceof TransientDependencyFailure;
}

/** Wait before the attempt that follows `attempt`. */
export function backoffDelay(policy: Pick<RetryPolicy, 'initialDelayMs' | 'backoffFactor'>, attempt: number): number {
  return policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1);
}

/**
 * Runs `operation` until it succeeds, a non-transient error is thrown, or
 * `maxAttempts` is reached. Holds no state between calls.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const isTransient = policy.isTransient ?? isTransientFailure;
  const sleep = policy.sleep ?? delay;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  let attempt = 0;
  while (true) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (err) {
      if (!isTransient(err)) throw err;
      if (attempt >= maxAttempts) throw new RetryExhaustedError(attempt, err);

      const delayMs = backoffDelay(policy, attempt);
      policy.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}

/**
 * Bounds `operation` by `timeoutMs`. On expiry the signal handed to the
 * operation is aborted and the call rejects with a transient timeout.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientDependencyFailure('timeout', `${label} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
