/**
 * @module worker-pool
 * Bounded async worker pool for concurrent step groups.
 *
 * Provides:
 * - {@link Semaphore} — generic async concurrency limiter
 * - {@link WorkerPool} — runs task batches under a per-batch limit and a
 *   pool-wide capacity, tracks active/peak workers, shuts down cleanly
 * - {@link WorkerPoolHandle} — lazy create-or-reuse owner of one pool
 */

import { StepflowError } from './errors.js';

// =====================================================================
// Semaphore — generic async concurrency limiter
// =====================================================================

export class Semaphore {
  private current = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    if (max < 1) throw new Error('Semaphore max must be >= 1');
    this.max = max;
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else if (this.current > 0) {
      this.current--;
    }
  }

  /** Run `fn` while holding one permit. */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.max - this.current;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get capacity(): number {
    return this.max;
  }
}

// =====================================================================
// WorkerPool
// =====================================================================

export interface WorkerPoolOptions {
  /** Pool-wide cap on simultaneously running tasks. Default: 32. */
  maxWorkers?: number;
}

/**
 * Pool shared by every concurrent group of a run.
 *
 * Each {@link WorkerPool.map} call gets its own limit; all calls together
 * never exceed the pool capacity. Tasks always run to completion: one
 * failure does not cancel its siblings.
 */
export class WorkerPool {
  private readonly capacity: Semaphore;
  private activeCount = 0;
  private peak = 0;
  private closed = false;
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(options: WorkerPoolOptions = {}) {
    this.capacity = new Semaphore(options.maxWorkers ?? 32);
  }

  /** Tasks running right now */
  get active(): number {
    return this.activeCount;
  }

  /** Highest number of simultaneously running tasks seen */
  get peakActive(): number {
    return this.peak;
  }

  get size(): number {
    return this.capacity.capacity;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /**
   * Run every task with at most `concurrency` of them active at once.
   *
   * @returns Settled outcomes in submission order
   * @throws {StepflowError} If the pool has been shut down
   */
  async map<T>(tasks: Array<() => Promise<T>>, concurrency: number): Promise<PromiseSettledResult<T>[]> {
    if (this.closed) {
      throw new StepflowError('POOL_SHUTDOWN', 'Worker pool has been shut down');
    }
    const limit = new Semaphore(Math.max(1, concurrency));
    const runs = tasks.map((task) => this.track(limit.use(() => this.capacity.use(() => this.runTask(task)))));
    return Promise.allSettled(runs);
  }

  /**
   * Stop accepting work and wait for in-flight tasks. Idempotent.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    await Promise.allSettled(Array.from(this.inFlight));
  }

  private async runTask<T>(task: () => Promise<T>): Promise<T> {
    this.activeCount++;
    this.peak = Math.max(this.peak, this.activeCount);
    try {
      return await task();
    } finally {
      this.activeCount--;
    }
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    this.inFlight.add(promise);
    const forget = (): void => {
      this.inFlight.delete(promise);
    };
    void promise.then(forget, forget);
    return promise;
  }
}

// =====================================================================
// WorkerPoolHandle — lazy, owned pool lifetime
// =====================================================================

/**
 * Creates the pool on first use and reuses it afterwards; a pool that was
 * shut down is replaced on the next {@link WorkerPoolHandle.get}.
 */
export class WorkerPoolHandle {
  private pool: WorkerPool | null = null;
  private created = 0;

  constructor(private readonly options: WorkerPoolOptions = {}) {}

  get(): WorkerPool {
    if (!this.pool || this.pool.isShutdown) {
      this.pool = new WorkerPool(this.options);
      this.created++;
    }
    return this.pool;
  }

  /** Number of pools created so far */
  get createdCount(): number {
    return this.created;
  }

  get current(): WorkerPool | null {
    return this.pool;
  }

  /** Shut the current pool down, if any. Idempotent. */
  async shutdown(): Promise<void> {
    if (this.pool) {
      await this.pool.shutdown();
    }
  }
}
