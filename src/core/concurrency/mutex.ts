// src/core/concurrency/mutex.ts
// Exclusive async lock guarding the shared database

export type Release = () => void;

export type MutexStats = {
  name?: string;
  locked: boolean;
  waiting: number;
  acquisitionCount: number;
};

/**
 * FIFO mutex. Waiters are granted the lock in the order they asked for it.
 */
export class Mutex {
  private held = false;
  private readonly waitQueue: Array<(release: Release) => void> = [];
  private acquisitionCount = 0;

  constructor(private readonly name?: string) {}

  /**
   * Resolves with a release function once the lock is held.
   */
  acquire(): Promise<Release> {
    return new Promise((resolve) => {
      if (!this.held) {
        this.held = true;
        this.acquisitionCount++;
        resolve(this.releaser());
        return;
      }
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Run `fn` while holding the lock. The lock is released when `fn` returns
   * or throws.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }

  stats(): MutexStats {
    return {
      name: this.name,
      locked: this.held,
      waiting: this.waitQueue.length,
      acquisitionCount: this.acquisitionCount,
    };
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waitQueue.shift();
      if (next) {
        // Ownership passes directly to the next waiter.
        this.acquisitionCount++;
        next(this.releaser());
      } else {
        this.held = false;
      }
    };
  }
}
