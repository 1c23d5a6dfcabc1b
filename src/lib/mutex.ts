/**
 * Countdown Bot — src/lib/mutex.ts
 * WHAT: Promise-chain mutex and a keyed variant.
 * WHY: The store rewrites the whole state file on every mutation; two writers
 *      racing would drop the loser's change. Pinned refreshes for one guild
 *      must not interleave either.
 * USAGE:
 *  const lock = new Mutex();
 *  await lock.runExclusive(async () => { ... });
 *
 * Not reentrant: calling runExclusive from inside runExclusive on the same
 * mutex deadlocks.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of callers holding or waiting for the lock */
  get queued(): number {
    return this.pending;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}

/**
 * One Mutex per key, created on demand and dropped once nobody waits on it.
 */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }

    try {
      return await lock.runExclusive(fn);
    } finally {
      if (lock.queued === 0 && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }
}
