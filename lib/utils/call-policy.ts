/**
 * Call policy for external collaborators: retry with backoff and rate limiting
 */

import { classifyError, isRetryable } from '../errors';
import { Logger, retry, sleep } from '../utils';

export interface RetryPolicy {
  max_attempts: number;
  initial_delay_ms: number;
}

/**
 * Runs one collaborator call under the retry policy. Whatever the call throws
 * is classified first, so only transient failures are attempted again; the
 * error surfaced after the last attempt is the classified one.
 */
export async function withRetryPolicy<T>(
  collaborator: string,
  fn: () => Promise<T>,
  policy: RetryPolicy
): Promise<T> {
  return retry(
    async () => {
      try {
        return await fn();
      } catch (error) {
        throw classifyError(collaborator, error);
      }
    },
    {
      maxRetries: policy.max_attempts,
      delayMs: policy.initial_delay_ms,
      backoff: true,
      shouldRetry: isRetryable,
      onError: (error, attempt) => {
        Logger.warn(`${collaborator} call failed`, {
          attempt,
          max_attempts: policy.max_attempts,
          retryable: isRetryable(error),
          error: error.message,
        });
      },
    }
  );
}

/**
 * Rate limiter to prevent bursts
 */
export class RateLimiter {
  private queue: Array<() => void> = [];
  private activeCount = 0;
  private lastCallTime = 0;

  constructor(
    private maxConcurrent: number = 5,
    private minDelayMs: number = 200
  ) {}

  async acquire(): Promise<void> {
    // Wait if too many concurrent requests
    while (this.activeCount >= this.maxConcurrent) {
      await new Promise<void>(resolve => {
        this.queue.push(resolve);
      });
    }

    // Enforce minimum delay between requests
    const now = Date.now();
    const timeSinceLastCall = now - this.lastCallTime;
    if (this.minDelayMs > 0 && timeSinceLastCall < this.minDelayMs) {
      await sleep(this.minDelayMs - timeSinceLastCall);
    }

    this.activeCount++;
    this.lastCallTime = Date.now();
  }

  release(): void {
    this.activeCount--;
    const resolve = this.queue.shift();
    if (resolve) {
      resolve();
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
