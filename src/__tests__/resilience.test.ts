/**
 * Tests for retry and poll interval policies.
 */

import { describe, it, expect, vi } from 'vitest';
import { NetworkError, RateLimitError, RequestError, ServerError } from '../errors/index.js';
import { pollDelayMs, withTimeout, DEFAULT_QUERY_POLL_POLICY } from '../resilience/polling.js';
import { RetryExecutor } from '../resilience/retry.js';

const config = {
  maxRetries: 3,
  initialBackoffMs: 100,
  maxBackoffMs: 1000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

function recordingSleep(): { sleeps: number[]; sleep: (ms: number) => Promise<void> } {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

describe('RetryExecutor', () => {
  it('should retry transient failures with exponential backoff', async () => {
    const { sleeps, sleep } = recordingSleep();
    const executor = new RetryExecutor(config, {}, { sleep, random: () => 0 });
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ServerError(500))
      .mockRejectedValueOnce(new NetworkError('socket hang up'))
      .mockResolvedValue('ok');

    await expect(executor.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('should not retry non-retryable errors', async () => {
    const { sleeps, sleep } = recordingSleep();
    const executor = new RetryExecutor(config, {}, { sleep });
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new RequestError('bad request'));

    await expect(executor.execute(operation)).rejects.toThrow('bad request');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('should give up after maxRetries and report exhaustion', async () => {
    const { sleeps, sleep } = recordingSleep();
    const onRetry = vi.fn();
    const onExhausted = vi.fn();
    const executor = new RetryExecutor(config, { onRetry, onExhausted }, { sleep, random: () => 0 });
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new ServerError(502));

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(ServerError);
    expect(operation).toHaveBeenCalledTimes(4);
    expect(sleeps).toEqual([100, 200, 400]);
    expect(onRetry).toHaveBeenCalledTimes(3);
    expect(onExhausted).toHaveBeenCalledWith(expect.any(ServerError), 4);
  });

  it('should prefer Retry-After, capped at the max backoff', () => {
    const executor = new RetryExecutor(config, {}, { random: () => 0 });
    expect(executor.calculateDelay(new RateLimitError({ retryAfterMs: 300 }), 1)).toBe(300);
    expect(executor.calculateDelay(new RateLimitError({ retryAfterMs: 5000 }), 1)).toBe(1000);
  });

  it('should add jitter and cap the delay', () => {
    const executor = new RetryExecutor(config, {}, { random: () => 1 });
    expect(executor.calculateDelay(new ServerError(500), 1)).toBe(110);
    expect(executor.calculateDelay(new ServerError(500), 10)).toBe(1000);
  });
});

describe('pollDelayMs', () => {
  it('should return the constant interval', () => {
    expect(pollDelayMs(DEFAULT_QUERY_POLL_POLICY, 1)).toBe(2000);
    expect(pollDelayMs(DEFAULT_QUERY_POLL_POLICY, 9)).toBe(2000);
  });

  it('should grow exponentially up to the maximum', () => {
    const policy = {
      type: 'exponential' as const,
      initialIntervalMs: 1000,
      maxIntervalMs: 8000,
      multiplier: 2,
      timeoutMs: 60000,
    };
    expect([1, 2, 3, 4, 5].map((attempt) => pollDelayMs(policy, attempt))).toEqual([1000, 2000, 4000, 8000, 8000]);
  });

  it('should replace only the budget in withTimeout', () => {
    expect(withTimeout(DEFAULT_QUERY_POLL_POLICY, 5000)).toEqual({ type: 'constant', intervalMs: 2000, timeoutMs: 5000 });
  });
});
