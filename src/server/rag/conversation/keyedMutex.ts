type Release = () => void;

/**
 * One FIFO lock per key. Work on different keys never waits on each other;
 * idle keys are dropped so the map only holds keys with holders or waiters.
 */
export class KeyedMutex {
  private readonly held = new Map<string, Array<() => void>>();

  async acquire(key: string): Promise<Release> {
    const waiters = this.held.get(key);
    if (!waiters) {
      this.held.set(key, []);
      return this.releaserFor(key);
    }

    return new Promise<Release>((resolve) => {
      waiters.push(() => resolve(this.releaserFor(key)));
    });
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  private releaserFor(key: string): Release {
    let released = false;
    return () => {
      if (released) { return; }
      released = true;
      this.release(key);
    };
  }

  private release(key: string): void {
    const waiters = this.held.get(key);
    const next = waiters?.shift();
    if (next) {
      next();
      return;
    }
    this.held.delete(key);
  }
}
