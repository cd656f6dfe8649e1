import { DEFAULT_LIMITS, getConfig } from "../config.js";
import { AcquireTimeoutError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { canonicalBucket, DEFAULT_BUCKET, DEFAULT_RULES, normalizeResourceClass, type NormalizationRule } from "./rules.js";
import { Semaphore } from "./semaphore.js";

const log = createLogger("governor");

export type ResourceGovernorOptions = {
  /** Limits merged over the built-in defaults and the configured ones. */
  limits?: Record<string, number>;
  rules?: readonly NormalizationRule[];
  /** Default acquire timeout (default from config). */
  acquireTimeoutMs?: number;
};

export type BucketStatus = {
  limit: number;
  active: number;
  queued: number;
};

/** A held permit. `release()` only has an effect the first time. */
export type Permit = {
  readonly resourceClass: string;
  readonly bucket: string;
  release(): boolean;
};

/**
 * Per-resource-class concurrency limiter.
 *
 * Each canonical bucket gets its own semaphore, created lazily with the
 * limit configured at that moment. There is no lock across buckets.
 */
export class ResourceGovernor {
  private pools = new Map<string, Semaphore>();
  private limits: Record<string, number>;
  private rules: readonly NormalizationRule[];
  private acquireTimeoutMs: number;

  constructor(opts: ResourceGovernorOptions = {}) {
    const config = getConfig().governor;
    this.rules = opts.rules ?? DEFAULT_RULES;
    this.acquireTimeoutMs = opts.acquireTimeoutMs ?? config.acquireTimeoutMs;
    this.limits = { ...DEFAULT_LIMITS };
    this.mergeLimits(config.limits);
    if (opts.limits) this.mergeLimits(opts.limits);
  }

  private mergeLimits(limits: Record<string, number>): void {
    for (const [name, limit] of Object.entries(limits)) {
      this.limits[canonicalBucket(name, this.rules)] = limit;
    }
  }

  /** Resolve any resource class alias to its bucket name. */
  normalize(resourceClass: string): string {
    return normalizeResourceClass(resourceClass, this.limits, this.rules);
  }

  private pool(bucket: string): Semaphore {
    let pool = this.pools.get(bucket);
    if (!pool) {
      const limit = this.limits[bucket] ?? this.limits[DEFAULT_BUCKET] ?? 1;
      pool = new Semaphore(limit);
      this.pools.set(bucket, pool);
      log.debug(`Created pool for "${bucket}"`, { limit });
    }
    return pool;
  }

  /**
   * Wait for a permit on the bucket governing `resourceClass`.
   * Resolves false if none frees up within `timeoutMs`.
   */
  acquire(resourceClass: string, timeoutMs: number = this.acquireTimeoutMs): Promise<boolean> {
    return this.acquireBucket(this.normalize(resourceClass), resourceClass, timeoutMs);
  }

  private async acquireBucket(bucket: string, resourceClass: string, timeoutMs: number): Promise<boolean> {
    const pool = this.pool(bucket);

    if (pool.queued > 0 || pool.active >= pool.limit) {
      log.debug(`Waiting for "${bucket}" permit`, { active: pool.active, queued: pool.queued + 1 });
    }
    const acquired = await pool.acquire(timeoutMs);

    if (acquired) {
      log.debug(`Acquired "${bucket}" permit`, { resourceClass, active: pool.active });
    } else {
      log.warn(`Timed out waiting for "${bucket}" permit`, { resourceClass, timeoutMs });
    }
    return acquired;
  }

  /**
   * Return a permit taken with `acquire`. The bucket is resolved against the
   * current limits; permits from `acquirePermit` remember theirs instead.
   */
  release(resourceClass: string): void {
    this.releaseBucket(this.normalize(resourceClass), resourceClass);
  }

  /** Releasing a bucket nobody holds is logged and ignored. */
  private releaseBucket(bucket: string, resourceClass: string): void {
    const pool = this.pools.get(bucket);
    if (!pool || !pool.release()) {
      log.warn(`Release of "${bucket}" without a held permit ignored`, { resourceClass });
      return;
    }
    log.debug(`Released "${bucket}" permit`, { active: pool.active });
  }

  /**
   * Acquire a permit object whose release is idempotent; undefined on timeout.
   * The permit goes back to the bucket it came from even if limits change
   * while it is held.
   */
  async acquirePermit(resourceClass: string, timeoutMs: number = this.acquireTimeoutMs): Promise<Permit | undefined> {
    const bucket = this.normalize(resourceClass);
    const acquired = await this.acquireBucket(bucket, resourceClass, timeoutMs);
    if (!acquired) return undefined;

    let released = false;
    return {
      resourceClass,
      bucket,
      release: () => {
        if (released) return false;
        released = true;
        this.releaseBucket(bucket, resourceClass);
        return true;
      },
    };
  }

  /**
   * Run `fn` while holding a permit. The permit is released on every exit
   * path, and only if it was actually acquired.
   */
  async withPermit<T>(resourceClass: string, fn: () => Promise<T> | T, timeoutMs: number = this.acquireTimeoutMs): Promise<T> {
    const permit = await this.acquirePermit(resourceClass, timeoutMs);
    if (!permit) {
      throw new AcquireTimeoutError(resourceClass, this.normalize(resourceClass), timeoutMs);
    }
    try {
      return await fn();
    } finally {
      permit.release();
    }
  }

  /** Snapshot of every bucket that has been used so far. */
  getStatus(): Record<string, BucketStatus> {
    const status: Record<string, BucketStatus> = {};
    for (const [bucket, pool] of this.pools) {
      status[bucket] = { limit: pool.limit, active: pool.active, queued: pool.queued };
    }
    return status;
  }

  /** Effective configured limits, including ones whose pools do not exist yet. */
  getLimits(): Record<string, number> {
    return { ...this.limits };
  }

  /**
   * Change configured limits. Only pools created after this call see the new
   * values; existing pools keep their size until `reset()`.
   */
  updateLimits(newLimits: Record<string, number>): void {
    this.mergeLimits(newLimits);
    const stale = Object.keys(newLimits)
      .map((name) => canonicalBucket(name, this.rules))
      .filter((bucket) => this.pools.has(bucket));
    log.info("Updated limits", { limits: newLimits });
    if (stale.length > 0) {
      log.warn("Existing pools keep their previous limits", { buckets: stale });
    }
  }

  /** Drop idle pools so they are recreated with current limits; fails queued waiters. */
  reset(): void {
    for (const [bucket, pool] of this.pools) {
      pool.drain();
      if (pool.active === 0) this.pools.delete(bucket);
    }
  }
}
