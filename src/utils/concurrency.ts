/**
 * ConcurrencyLimiter
 *
 * Limits the number of async operations running at once. Similar to p-limit but
 * built-in, and exposes its counters so callers can report pool occupancy.
 * Queued operations start in FIFO order as soon as a slot frees up.
 */
export class ConcurrencyLimiter {
  private readonly queue: Array<() => void> = [];
  private active = 0;

  constructor(private readonly concurrency: number) {
    if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
      throw new TypeError('Expected `concurrency` to be a number from 1 and up');
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Run `fn` once a slot is available
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    const execute = async (): Promise<T> => {
      this.active++;
      try {
        return await fn();
      } finally {
        this.next();
      }
    };

    if (this.active < this.concurrency) {
      return execute();
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        execute().then(resolve, reject);
      });
    });
  }

  private next(): void {
    this.active--;
    const nextFn = this.queue.shift();
    if (nextFn) {
      nextFn();
    }
  }
}

/**
 * KeyedMutex
 *
 * Promise-based lock per key: callers for the same key run one after another,
 * callers for different keys run concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder cleans up so the map does not grow with every key ever seen
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
