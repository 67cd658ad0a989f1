// src/core/http/RetryPolicy.ts

import type { RetryConfig } from './types';

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelay: 2000,
  backoffFactor: 2,
  maxDelay: 60000,
};

/**
 * Attempt ceiling and exponential backoff for one candidate.
 * `failures` counts failed calls so far (1 after the first failure).
 */
export class RetryPolicy {
  constructor(private config: RetryConfig = DEFAULT_RETRY_CONFIG) {}

  get maxAttempts(): number {
    return this.config.maxRetries;
  }

  isExhausted(failures: number): boolean {
    return failures >= this.config.maxRetries;
  }

  /**
   * baseDelay × factor^(failures-1). A server-sent Retry-After only ever
   * lengthens the wait; the result never exceeds maxDelay.
   */
  backoffDelay(failures: number, retryAfterMs?: number): number {
    const exponential = this.config.baseDelay * Math.pow(this.config.backoffFactor, Math.max(0, failures - 1));
    const wait = retryAfterMs !== undefined ? Math.max(exponential, retryAfterMs) : exponential;
    return Math.min(wait, this.config.maxDelay);
  }
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds) && value.trim() !== '') {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
