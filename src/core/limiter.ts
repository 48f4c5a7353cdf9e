/**
 * Concurrency primitives shared by the platform clients and the download cache.
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Create a limiter that runs at most `concurrency` tasks at once.
 * Tasks beyond the cap wait in FIFO order.
 */
export function createLimiter(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  let active = 0;
  const waiting: Array<() => void> = [];

  const release = (): void => {
    const resume = waiting.shift();
    if (resume) {
      // Slot is handed over directly, active count stays the same
      resume();
      return;
    }
    active--;
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active >= concurrency) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    } else {
      active++;
    }

    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Deduplicates concurrent work by key.
 * While a task for a key is in flight, later callers get the same promise.
 */
export class SingleFlight<T> {
  private inFlight = new Map<string, Promise<T>>();

  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const promise = task().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }
}
