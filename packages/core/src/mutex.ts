/**
 * @module mutex
 * FIFO promise-chained locks.
 *
 * {@link Mutex} serialises work on a single lane (one transport channel);
 * {@link KeyedMutex} serialises work per key (one draft id) while letting
 * different keys run concurrently.
 */

/** Releases a held lock. Calling it more than once has no effect. */
export type Release = () => void;

/** A single FIFO lock. */
export class Mutex {
  /** Settles when the most recent holder releases. */
  private tail: Promise<void> = Promise.resolve();
  /** Holders plus waiters. */
  private pending = 0;

  /** Whether the lock is held or has waiters. */
  get locked(): boolean {
    return this.pending > 0;
  }

  /** Wait for the lock. Resolves with the function that releases it. */
  acquire(): Promise<Release> {
    const previous = this.tail;
    let signal: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      signal = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending += 1;

    let released = false;
    const release: Release = () => {
      if (released) return;
      released = true;
      this.pending -= 1;
      signal();
    };
    return previous.then(() => release);
  }

  /** Run `task` while holding the lock. */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }
}

/** One {@link Mutex} per key, created on demand and evicted when idle. */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  /** Number of keys currently held or awaited. */
  get size(): number {
    return this.locks.size;
  }

  /** Whether `key` is held or has waiters. */
  isLocked(key: string): boolean {
    return this.locks.get(key)?.locked ?? false;
  }

  /** Wait for the lock on `key`. */
  async acquire(key: string): Promise<Release> {
    const mutex = this.getOrCreate(key);
    const release = await mutex.acquire();
    return () => {
      release();
      if (!mutex.locked && this.locks.get(key) === mutex) {
        this.locks.delete(key);
      }
    };
  }

  /** Run `task` while holding the lock on `key`. */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private getOrCreate(key: string): Mutex {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }
    return mutex;
  }
}
