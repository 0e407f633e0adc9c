import { log } from "./logger.js";

export class JobCancelledError extends Error {
  constructor() {
    super("Job cancelled before it started");
    this.name = "JobCancelledError";
  }
}

type QueuedJob = {
  start: () => void;
  cancel: () => void;
};

/**
 * Fixed-size pool of async worker slots. Jobs beyond `size` wait in FIFO
 * order; waiting jobs can be cancelled, running ones cannot.
 */
export class WorkerPool {
  private readonly size: number;
  private active = 0;
  private queue: QueuedJob[] = [];
  private stats = { started: 0, completed: 0, cancelled: 0 };

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /** Run `job` as soon as a slot is free. Rejects with JobCancelledError if cancelled while queued. */
  submit<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        this.stats.started++;
        Promise.resolve()
          .then(job)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.stats.completed++;
            this.drain();
          });
      };
      const cancel = () => {
        this.stats.cancelled++;
        reject(new JobCancelledError());
      };
      this.queue.push({ start, cancel });
      this.drain();
    });
  }

  /** Cancel every job that has not started yet. Returns how many were cancelled. */
  cancelPending(): number {
    const dropped = this.queue;
    this.queue = [];
    for (const job of dropped) job.cancel();
    if (dropped.length > 0) {
      log.debug("Cancelled queued jobs", { count: dropped.length });
    }
    return dropped.length;
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  getStats(): { started: number; completed: number; cancelled: number } {
    return { ...this.stats };
  }

  private drain(): void {
    while (this.active < this.size && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next) next.start();
    }
  }
}
