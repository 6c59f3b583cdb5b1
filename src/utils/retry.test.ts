/**
 * Tests for rate-limit retry
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { computeBackoffDelay, withRetry } from './retry.js';
import type { RetryConfig } from './retry.js';
import type { Result } from '../types/index.js';
import { CancelledError } from './timeout.js';

class FlakyError extends Error {
  constructor(readonly retryable: boolean) {
    super(retryable ? 'slow down' : 'denied');
  }
}

const config: RetryConfig = { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000 };
const isRetryable = (error: FlakyError) => error.retryable;

function sequence(results: Array<Result<string, FlakyError>>) {
  const fn = vi.fn(async (): Promise<Result<string, FlakyError>> => {
    const next = results.shift();
    if (!next) throw new Error('no more results');
    return next;
  });
  return fn;
}

describe('computeBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles per attempt with jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(computeBackoffDelay(0, config)).toBe(150);
    expect(computeBackoffDelay(2, config)).toBe(450);
  });

  it('caps at maxDelayMs', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(computeBackoffDelay(10, config)).toBe(1000);
  });
});

describe('withRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('returns the first success without sleeping', async () => {
    const fn = sequence([{ ok: true, value: 'ok' }]);
    await expect(withRetry(fn, isRetryable, config)).resolves.toEqual({ ok: true, value: 'ok' });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('returns a non-retryable failure after one attempt', async () => {
    const fn = sequence([{ ok: false, error: new FlakyError(false) }]);
    const result = await withRetry(fn, isRetryable, config);

    expect(result.ok).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries retryable failures until success', async () => {
    vi.useFakeTimers();
    const fn = sequence([
      { ok: false, error: new FlakyError(true) },
      { ok: false, error: new FlakyError(true) },
      { ok: true, value: 'finally' },
    ]);

    const promise = withRetry(fn, isRetryable, config);
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toEqual({ ok: true, value: 'finally' });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('gives up after maxRetries and returns the last failure', async () => {
    vi.useFakeTimers();
    const fn = vi.fn(async (): Promise<Result<string, FlakyError>> => ({ ok: false, error: new FlakyError(true) }));

    const promise = withRetry(fn, isRetryable, config);
    await vi.runAllTimersAsync();

    const result = await promise;
    expect(result.ok).toBe(false);
    expect(fn).toHaveBeenCalledTimes(4);
  });

  it('rejects with CancelledError when aborted during backoff', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (): Promise<Result<string, FlakyError>> => ({ ok: false, error: new FlakyError(true) }));

    const promise = withRetry(fn, isRetryable, { ...config, baseDelayMs: 60000, maxDelayMs: 60000 }, controller.signal);
    await vi.waitFor(() => expect(fn).toHaveBeenCalledTimes(1));
    controller.abort();

    await expect(promise).rejects.toBeInstanceOf(CancelledError);
  });
});
