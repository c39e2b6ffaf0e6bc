import { describeError } from "./errors.js";
import { DEFAULTS, type QuakeLogger } from "./types.js";

export type DispatchTask = () => Promise<void>;

export type DispatchQueueOptions = {
  /** Tasks allowed to run at once. */
  concurrency?: number;
  /** Tasks allowed to wait. Submissions beyond this are dropped. */
  capacity?: number;
  logger?: QuakeLogger;
  logPrefix?: string;
};

export type DispatchQueueStats = {
  running: number;
  pending: number;
  completed: number;
  failed: number;
  dropped: number;
};

/**
 * Bounded worker pool for notification delivery.
 *
 * `submit` never waits: ingestion hands off the task and moves on. A burst
 * larger than `concurrency + capacity` loses the overflow instead of piling
 * up unbounded work.
 */
export class DispatchQueue {
  private pending: DispatchTask[] = [];
  private running = 0;
  private completed = 0;
  private failed = 0;
  private dropped = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private readonly capacity: number;
  private readonly logger: QuakeLogger;
  private readonly logPrefix: string;

  constructor(opts: DispatchQueueOptions = {}) {
    this.concurrency = opts.concurrency ?? DEFAULTS.dispatchConcurrency;
    this.capacity = opts.capacity ?? DEFAULTS.dispatchCapacity;
    if (this.concurrency < 1) {
      throw new RangeError("concurrency must be at least 1");
    }
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "quakewatch";
  }

  /** Queue a task. Returns false when it was dropped for lack of room. */
  submit(task: DispatchTask): boolean {
    if (this.running < this.concurrency) {
      this.run(task);
      return true;
    }
    if (this.pending.length >= this.capacity) {
      this.dropped++;
      this.logger.warn(`${this.logPrefix}: dispatch queue full (${this.capacity}), notification dropped`);
      return false;
    }
    this.pending.push(task);
    return true;
  }

  /** Resolves once nothing is running or waiting. */
  onIdle(): Promise<void> {
    if (this.running === 0 && this.pending.length === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getStats(): DispatchQueueStats {
    return {
      running: this.running,
      pending: this.pending.length,
      completed: this.completed,
      failed: this.failed,
      dropped: this.dropped,
    };
  }

  private run(task: DispatchTask): void {
    this.running++;
    void Promise.resolve()
      .then(task)
      .then(
        () => {
          this.completed++;
        },
        (err: unknown) => {
          this.failed++;
          this.logger.error(`${this.logPrefix}: dispatch task failed: ${describeError(err)}`);
        },
      )
      .finally(() => {
        this.running--;
        this.next();
      });
  }

  private next(): void {
    const task = this.pending.shift();
    if (task) {
      this.run(task);
      return;
    }
    if (this.running === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }
}
