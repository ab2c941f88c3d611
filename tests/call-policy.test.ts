/**
 * Tests for the collaborator call policy
 */

import { describe, it, expect } from 'vitest';
import { CollaboratorRequestError, CollaboratorTransportError } from '../lib/errors';
import { RateLimiter, withRetryPolicy } from '../lib/utils/call-policy';
import { sleep } from '../lib/utils';
import { NO_DELAY_RETRY } from './helpers';

describe('withRetryPolicy', () => {
  it('should retry transient failures until one succeeds', async () => {
    let calls = 0;

    const result = await withRetryPolicy(
      'reasoning',
      async () => {
        calls++;
        if (calls < 3) throw Object.assign(new Error('Service Unavailable'), { status: 503 });
        return 'scored';
      },
      NO_DELAY_RETRY
    );

    expect(result).toBe('scored');
    expect(calls).toBe(3);
  });

  it('should surface the classified error once attempts run out', async () => {
    let calls = 0;

    const attempt = withRetryPolicy(
      'reasoning',
      async () => {
        calls++;
        throw Object.assign(new Error('Service Unavailable'), { status: 503 });
      },
      NO_DELAY_RETRY
    );

    await expect(attempt).rejects.toBeInstanceOf(CollaboratorTransportError);
    await expect(attempt).rejects.toThrow('reasoning: Service Unavailable');
    expect(calls).toBe(3);
  });

  it('should not retry a permanent failure', async () => {
    let calls = 0;

    const attempt = withRetryPolicy(
      'reasoning',
      async () => {
        calls++;
        throw new Error('model not found');
      },
      NO_DELAY_RETRY
    );

    await expect(attempt).rejects.toBeInstanceOf(CollaboratorRequestError);
    expect(calls).toBe(1);
  });
});

describe('RateLimiter', () => {
  it('should cap the number of calls in flight', async () => {
    const limiter = new RateLimiter(3, 0);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      Array.from({ length: 8 }, (_, i) =>
        limiter.execute(async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(2);
          active--;
          return i;
        })
      )
    );

    expect(results).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(peak).toBe(3);
  });

  it('should release its slot when a call fails', async () => {
    const limiter = new RateLimiter(1, 0);

    await expect(limiter.execute(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await limiter.execute(async () => 'next')).toBe('next');
  });
});
