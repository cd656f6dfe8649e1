type Waiter = {
  resolve: (acquired: boolean) => void;
  timer?: NodeJS.Timeout;
};

/**
 * Counting semaphore with FIFO waiters and per-acquire timeouts.
 * A release with waiters queued hands the permit straight to the oldest one.
 */
export class Semaphore {
  readonly limit: number;
  private available: number;
  private waiters: Waiter[] = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
    this.available = limit;
  }

  /** Permits currently held. */
  get active(): number {
    return this.limit - this.available;
  }

  /** Callers waiting for a permit. */
  get queued(): number {
    return this.waiters.length;
  }

  tryAcquire(): boolean {
    if (this.available > 0) {
      this.available--;
      return true;
    }
    return false;
  }

  /** Resolves true once a permit is held, false if `timeoutMs` elapses first. */
  acquire(timeoutMs?: number): Promise<boolean> {
    if (this.tryAcquire()) return Promise.resolve(true);
    if (timeoutMs !== undefined && timeoutMs <= 0) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { resolve };
      if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
        waiter.timer = setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          resolve(false);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Returns false when no permit was held, leaving the count untouched. */
  release(): boolean {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve(true);
      return true;
    }
    if (this.available < this.limit) {
      this.available++;
      return true;
    }
    return false;
  }

  /** Fail every queued acquire. Held permits are unaffected. */
  drain(): number {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) {
      clearTimeout(w.timer);
      w.resolve(false);
    }
    return waiters.length;
  }
}
