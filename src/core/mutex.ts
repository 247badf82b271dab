/**
 * Mutex: FIFO promise-based mutual exclusion.
 *
 * `locked` is a plain flag kept in step with ownership, so "is this busy?"
 * can be asked without racing the lock itself.
 *
 * Usage:
 *   const release = await mutex.acquire();
 *   try { ... } finally { release(); }
 *   // or
 *   await mutex.runExclusive(async () => { ... });
 */

export type Release = () => void;

export class Mutex {
  private held = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  /** Whether an owner currently holds the lock. */
  get locked(): boolean {
    return this.held;
  }

  /** Number of callers queued behind the current owner. */
  get waiting(): number {
    return this.waiters.length;
  }

  /** Resolve with a release function once the lock is ours. */
  acquire(): Promise<Release> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Ownership passes directly; `held` stays true.
        next(this.createRelease());
      } else {
        this.held = false;
      }
    };
  }
}
