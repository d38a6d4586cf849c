import { describe, it, expect, vi } from 'vitest';
import { FetchError, FetchRateLimitedError, FetchTransientError } from '@tessera/core';
import { retryDelayFor, withRetry, type RetryPolicy } from '@tessera/crawler';

function policy(sleeps: number[]): RetryPolicy {
  return {
    maxAttempts: 3,
    delayMs: 10,
    rateLimitDelayMs: 100,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  };
}

describe('withRetry', () => {
  it('retries transient failures with a fixed delay', async () => {
    const sleeps: number[] = [];
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new FetchTransientError('fake', 'reset'))
      .mockRejectedValueOnce(new FetchTransientError('fake', 'reset'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, policy(sleeps))).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([10, 10]);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const sleeps: number[] = [];
    const fn = vi.fn(async () => {
      throw new FetchTransientError('fake', 'down', 503);
    });
    await expect(withRetry(fn, policy(sleeps))).rejects.toThrow(
      'fake request failed (HTTP 503): down',
    );
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const sleeps: number[] = [];
    const fn = vi.fn(async () => {
      throw new FetchError('fake', 400, 'bad request');
    });
    await expect(withRetry(fn, policy(sleeps))).rejects.toBeInstanceOf(FetchError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('backs off longer on rate limiting', async () => {
    const sleeps: number[] = [];
    const fn = vi
      .fn<[], Promise<number>>()
      .mockRejectedValueOnce(new FetchRateLimitedError('fake'))
      .mockResolvedValue(1);
    await withRetry(fn, policy(sleeps));
    expect(sleeps).toEqual([100]);
  });
});

describe('retryDelayFor', () => {
  it('honours a Retry-After longer than the configured backoff', () => {
    expect(retryDelayFor(new FetchRateLimitedError('fake', 45000), policy([]))).toBe(45000);
    expect(retryDelayFor(new FetchRateLimitedError('fake', 50), policy([]))).toBe(100);
  });
});
