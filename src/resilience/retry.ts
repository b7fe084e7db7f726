/**
 * Retry executor with exponential backoff for bulk service calls.
 */

import type { RetryConfig } from '../config/index.js';
import { getRetryDelayMs, isRetryableError } from '../errors/index.js';
import { defaultSleep, type Sleep } from './polling.js';

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when all retries are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
}

/**
 * Retries transient failures (rate limits, network faults, 5xx). Anything else
 * is rethrown on the first attempt.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHooks;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    config: RetryConfig,
    hooks: RetryHooks = {},
    options: { sleep?: Sleep; random?: () => number } = {}
  ) {
    this.config = config;
    this.hooks = hooks;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Executes an operation with retry logic.
   * @throws The last error if all retries are exhausted
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const maxAttempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (!isRetryableError(lastError)) {
          throw lastError;
        }
        if (attempt >= maxAttempts) {
          this.hooks.onExhausted?.(lastError, attempt);
          throw lastError;
        }

        const delayMs = this.calculateDelay(lastError, attempt);
        this.hooks.onRetry?.(attempt, lastError, delayMs);
        await this.sleep(delayMs);
      }
    }
  }

  /**
   * Delay before retry number `attempt`.
   */
  calculateDelay(error: Error, attempt: number): number {
    // A server-provided Retry-After wins, still capped
    const retryAfter = getRetryDelayMs(error);
    if (retryAfter !== undefined && retryAfter > 0) {
      return Math.min(retryAfter, this.config.maxBackoffMs);
    }

    const exponentialDelay =
      this.config.initialBackoffMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxBackoffMs);
    const jitter = cappedDelay * this.config.jitterFactor * this.random();

    return Math.floor(Math.min(cappedDelay + jitter, this.config.maxBackoffMs));
  }
}
