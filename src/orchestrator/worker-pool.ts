/**
 * Fixed-size worker pool for chunk polling and page collection.
 */

/**
 * Counting semaphore limiting concurrent work.
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else {
      this.permits++;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Runs `worker` over every item with at most `concurrency` in flight and waits for
 * all of them. Results keep input order; a failure does not cancel the others.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(concurrency);
  return Promise.allSettled(items.map((item, index) => semaphore.run(() => worker(item, index))));
}

/**
 * Like mapSettled, but rethrows the first failure (in input order) once every worker has finished.
 */
export async function mapAll<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const settled = await mapSettled(items, concurrency, worker);
  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}
