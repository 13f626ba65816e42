/**
 * Concurrency helpers for fan-out across users.
 */

/**
 * Runs async tasks with at most `maxInFlight` running at once.
 */
export type ConcurrencyLimiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Create a FIFO limiter. Tasks beyond the limit wait in order of submission.
 */
export function createConcurrencyLimiter(maxInFlight: number): ConcurrencyLimiter {
  if (!Number.isInteger(maxInFlight) || maxInFlight < 1) {
    throw new RangeError(`maxInFlight must be a positive integer, got ${String(maxInFlight)}`);
  }

  let active = 0;
  const waiting: (() => void)[] = [];

  // A finishing task hands its slot straight to the next waiter, so a
  // caller arriving in between cannot overtake the queue.
  const release = (): void => {
    const next = waiting.shift();
    if (next) {
      next();
    } else {
      active--;
    }
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    if (active >= maxInFlight) {
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
 * Serializes async sections per key.
 *
 * Used to keep read-modify-write sequences on one storage document, and
 * delivery cycles for one user, from interleaving.
 */
export class KeyedMutex<K = string> {
  private readonly tails = new Map<K, Promise<void>>();

  async runExclusive<T>(key: K, section: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
