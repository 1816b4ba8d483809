import { describe, it, expect, vi } from 'vitest';
import {
  FatalConfigurationError,
  ModelRequestError,
  RetryExhaustedError,
  TransientDependencyFailure,
  errorMessage,
} from '../errors';
import { backoffDelay, withRetry, withTimeout } from '../retry';

const policy = (overrides = {}) => ({
  maxAttempts: 3,
  initialDelayMs: 10,
  backoffFactor: 2,
  sleep: vi.fn(async () => undefined),
  ...overrides,
});

describe('errors', () => {
  it('names errors after their class and keeps a stable kind', () => {
    const err = new TransientDependencyFailure('rate_limit', 'slow down');

    expect(err.name).toBe('TransientDependencyFailure');
    expect(err.kind).toBe('TransientDependencyFailure');
    expect(err.reason).toBe('rate_limit');
    expect(new ModelRequestError('bad model', 404).status).toBe(404);
  });

  it('formats unknown thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage({ code: 7 })).toBe('{"code":7}');
  });
});

describe('backoffDelay', () => {
  it('grows geometrically from the initial delay', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay({ initialDelayMs: 10, backoffFactor: 2 }, attempt))).toEqual([10, 20, 40]);
  });
});

describe('withRetry', () => {
  it('retries transient failures with backoff until the operation succeeds', async () => {
    const onRetry = vi.fn();
    const retry = policy({ onRetry });
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new TransientDependencyFailure('timeout', 't1'))
      .mockRejectedValueOnce(new TransientDependencyFailure('unavailable', 't2'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(operation, retry)).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(3);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3]);
    expect(retry.sleep.mock.calls).toEqual([[10], [20]]);
    expect(onRetry.mock.calls.map(([info]) => [info.attempt, info.delayMs])).toEqual([
      [1, 10],
      [2, 20],
    ]);
  });

  it('gives up after maxAttempts with the last cause', async () => {
    const last = new TransientDependencyFailure('network', 'down');
    const operation = vi.fn(async () => {
      throw last;
    });

    const error = await withRetry(operation, policy()).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.cause).toBe(last);
      expect(error.message).toBe('Gave up after 3 attempt(s): down');
    }
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('propagates non-transient failures immediately', async () => {
    const retry = policy();
    const operation = vi.fn(async () => {
      throw new FatalConfigurationError('no key');
    });

    await expect(withRetry(operation, retry)).rejects.toBeInstanceOf(FatalConfigurationError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(retry.sleep).not.toHaveBeenCalled();
  });

  it('honours a custom transient predicate', async () => {
    const operation = vi.fn<[number], Promise<number>>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce(1);

    await expect(withRetry(operation, policy({ isTransient: () => true }))).resolves.toBe(1);
  });
});

describe('withTimeout', () => {
  it('returns the result of a fast operation', async () => {
    await expect(withTimeout(async () => 'fast', 1000, 'Op')).resolves.toBe('fast');
  });

  it('aborts the signal and rejects with a transient timeout', async () => {
    let seen: AbortSignal | undefined;
    const operation = (signal: AbortSignal) =>
      new Promise<string>((resolve) => {
        seen = signal;
        signal.addEventListener('abort', () => resolve('too late'));
      });

    const error = await withTimeout(operation, 10, 'Model call').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientDependencyFailure);
    if (error instanceof TransientDependencyFailure) {
      expect(error.reason).toBe('timeout');
      expect(error.message).toBe('Model call timed out after 10ms');
    }
    expect(seen?.aborted).toBe(true);
  });
});
