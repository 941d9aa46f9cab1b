/**
 * Async serialization primitives.
 * - AsyncMutex: single-resource exclusive lock
 * - KeyedMutex: one AsyncMutex per key, created on demand and dropped when idle
 */

/**
 * AsyncMutex — Exclusive lock for async operations.
 * Only one holder at a time; others queue in FIFO order.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Run a function while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand over in a microtask to avoid deep synchronous chains
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * KeyedMutex — serializes work per key while letting different keys run
 * concurrently.
 */
export class KeyedMutex<K> {
  private locks: Map<K, AsyncMutex> = new Map();

  async withLock<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.locks.set(key, mutex);
    }
    const held = mutex;

    try {
      return await held.withLock(fn);
    } finally {
      if (!held.isLocked && held.queueLength === 0 && this.locks.get(key) === held) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.locks.get(key)?.isLocked ?? false;
  }

  get size(): number {
    return this.locks.size;
  }
}
