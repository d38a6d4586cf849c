/**
 * Fixed-backoff retry for fetch calls. Transient failures wait `delayMs`; rate-limit responses
 * wait `rateLimitDelayMs` (or the server's Retry-After when longer). Anything else is rethrown
 * at once.
 */

import {
  FetchRateLimitedError,
  describeError,
  isRetryableError,
} from '@tessera/core';
import { crawlLog } from './logs';
import { sleep as defaultSleep, type Sleep } from './sleep';

export interface RetryPolicy {
  /** Total attempts including the first. */
  maxAttempts: number;
  delayMs: number;
  rateLimitDelayMs: number;
  sleep?: Sleep;
  /** Component name for log lines. */
  label?: string;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  delayMs: 5000,
  rateLimitDelayMs: 30000,
};

export function retryDelayFor(err: unknown, policy: RetryPolicy): number {
  if (err instanceof FetchRateLimitedError) {
    return Math.max(policy.rateLimitDelayMs, err.retryAfterMs ?? 0);
  }
  return policy.delayMs;
}

export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const sleep = policy.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.maxAttempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryableError(err) || attempt >= attempts) throw err;
      const delay = retryDelayFor(err, policy);
      crawlLog(policy.label ?? 'Retry', `${describeError(err)}; retrying in ${delay}ms`, {
        level: 'warn',
        detail: `attempt ${attempt}/${attempts}`,
      });
      await sleep(delay);
    }
  }
}
