/**
 * FIFO async mutex. `acquire` resolves with a release function.
 */
export class Mutex {
  private locked = false;
  private queue: (() => void)[] = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  get waiting(): number {
    return this.queue.length;
  }
}

/**
 * One mutex per key; used to serialize work per model lineage.
 */
export class KeyedMutex {
  private mutexes = new Map<string, Mutex>();

  async acquire(key: string): Promise<() => void> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new Mutex();
      this.mutexes.set(key, mutex);
    }
    return mutex.acquire();
  }

  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
      this.prune(key);
    }
  }

  isLocked(key: string): boolean {
    const mutex = this.mutexes.get(key);
    return mutex ? mutex.isLocked() : false;
  }

  private prune(key: string): void {
    const mutex = this.mutexes.get(key);
    if (mutex && !mutex.isLocked() && mutex.waiting === 0) {
      this.mutexes.delete(key);
    }
  }
}
