/**
 * Async mutual exclusion, one lock per key.
 *
 * Waiters are served in FIFO order. Used by the image-state stores to
 * serialize rotations per environment.
 */

export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /** Acquire the lock. Resolves with a release function. */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }
    return new Promise<() => void>((resolve) => {
      this.queue.push(() => resolve(this.createRelease()));
    });
  }

  /** Run a function while holding the lock. */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

export class KeyedMutex<K> {
  private locks = new Map<K, AsyncMutex>();

  async withLock<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    return this.lockFor(key).withLock(fn);
  }

  private lockFor(key: K): AsyncMutex {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new AsyncMutex();
      this.locks.set(key, lock);
    }
    return lock;
  }
}
