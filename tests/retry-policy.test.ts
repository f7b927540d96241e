import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, RetryExhaustedError } from '../src/execution/retry-policy.js';
import { ExchangeRejectionError, TransientSubmissionError } from '../src/errors.js';

function recordingWait() {
  const delays: number[] = [];
  const wait = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, wait };
}

describe('RetryPolicy', () => {
  it('computes a capped exponential schedule', () => {
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 250, maxDelayMs: 1000 });
    expect(policy.schedule()).toEqual([250, 500, 1000, 1000]);
  });

  it('returns the first success without waiting', async () => {
    const { delays, wait } = recordingWait();
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, wait);
    const op = vi.fn(async () => 'ok');
    await expect(policy.execute(op)).resolves.toBe('ok');
    expect(op).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('retries transient errors with backoff until success', async () => {
    const { delays, wait } = recordingWait();
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, wait);
    let calls = 0;
    const result = await policy.execute(async (attempt) => {
      calls++;
      if (attempt < 3) throw new TransientSubmissionError('503', 503);
      return attempt;
    });
    expect(result).toBe(3);
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it('does not retry an exchange rejection', async () => {
    const { wait } = recordingWait();
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000 }, wait);
    const op = vi.fn(async () => {
      throw new ExchangeRejectionError('insufficient_margin', 400);
    });
    await expect(policy.execute(op)).rejects.toBeInstanceOf(ExchangeRejectionError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('throws RetryExhaustedError with the last cause when the budget runs out', async () => {
    const { wait } = recordingWait();
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 10 }, wait);
    const last = new TransientSubmissionError('still down', 502);
    let calls = 0;
    const err = await policy
      .execute(async () => {
        calls++;
        throw calls === 2 ? last : new TransientSubmissionError('down', 503);
      })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 2, cause: last });
  });

  it('stops early when the next wait would pass the deadline', async () => {
    const { delays, wait } = recordingWait();
    const policy = new RetryPolicy({ maxAttempts: 5, baseDelayMs: 10_000, maxDelayMs: 10_000 }, wait);
    const onRetry = vi.fn();
    const err = await policy
      .execute(
        async () => {
          throw new TransientSubmissionError('503', 503);
        },
        { deadline: Date.now() + 1_000, onRetry },
      )
      .catch((e: unknown) => e);
    expect(err).toMatchObject({ attempts: 1 });
    expect(delays).toEqual([]);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('honours a custom retryable predicate', async () => {
    const { delays, wait } = recordingWait();
    const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 5, maxDelayMs: 5 }, wait);
    let calls = 0;
    const result = await policy.execute(
      async () => {
        calls++;
        if (calls === 1) throw new Error('flaky');
        return 'done';
      },
      { isRetryable: () => true },
    );
    expect(result).toBe('done');
    expect(delays).toEqual([5]);
  });
});
