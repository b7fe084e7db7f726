/**
 * Poll interval policies and injectable time sources.
 */

/**
 * Awaitable delay. Injected so tests drive polling without real time passing.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Monotonic-enough clock used for poll budgets.
 */
export interface Clock {
  now(): number;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Fixed interval between status reads.
 */
export interface ConstantPollPolicy {
  type: 'constant';
  intervalMs: number;
  /** Overall wait budget */
  timeoutMs: number;
}

/**
 * Interval grows by `multiplier` after each read, capped at `maxIntervalMs`.
 */
export interface ExponentialPollPolicy {
  type: 'exponential';
  initialIntervalMs: number;
  maxIntervalMs: number;
  multiplier: number;
  /** Overall wait budget */
  timeoutMs: number;
}

export type PollIntervalPolicy = ConstantPollPolicy | ExponentialPollPolicy;

/** Ingest jobs: 5s interval, 10 minute budget */
export const DEFAULT_INGEST_POLL_POLICY: ConstantPollPolicy = {
  type: 'constant',
  intervalMs: 5000,
  timeoutMs: 600_000,
};

/** Query jobs: 2s interval, 30 minute budget */
export const DEFAULT_QUERY_POLL_POLICY: ConstantPollPolicy = {
  type: 'constant',
  intervalMs: 2000,
  timeoutMs: 1_800_000,
};

/**
 * Delay before the status read following read number `attempt` (1-based).
 */
export function pollDelayMs(policy: PollIntervalPolicy, attempt: number): number {
  if (policy.type === 'constant') {
    return policy.intervalMs;
  }
  const delay = policy.initialIntervalMs * Math.pow(policy.multiplier, Math.max(0, attempt - 1));
  return Math.min(Math.floor(delay), policy.maxIntervalMs);
}

/**
 * Returns the policy with its overall budget replaced.
 */
export function withTimeout(policy: PollIntervalPolicy, timeoutMs: number): PollIntervalPolicy {
  return { ...policy, timeoutMs };
}
