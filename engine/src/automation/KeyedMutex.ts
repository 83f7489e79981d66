/**
 * Per-key mutual exclusion. Circuit mutations and checkpoint writes lock on
 * the unit name or execution id, so unrelated keys never wait on each other.
 *
 * @module automation
 */

class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const release = () => {
        const next = this.queue.shift();
        if (next) {
          next();
          return;
        }
        this.locked = false;
      };

      if (!this.locked) {
        this.locked = true;
        resolve(release);
        return;
      }

      this.queue.push(() => {
        this.locked = true;
        resolve(release);
      });
    });
  }

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  /**
   * Run `task` while holding the lock for `key`
   */
  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    let mutex = this.locks.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.locks.set(key, mutex);
    }

    const release = await mutex.acquire();
    try {
      return await task();
    } finally {
      release();
      if (mutex.idle) {
        this.locks.delete(key);
      }
    }
  }

  /**
   * Number of keys currently locked or waited on
   */
  get size(): number {
    return this.locks.size;
  }
}
