// src/services/OffloadPool.ts
import {
  PoolSaturatedError,
  ProviderFailureError,
} from 'App/errors/CustomError';

export interface OffloadPoolOptions {
  /** Maximum number of tasks in flight. */
  size: number;
  /** Maximum number of waiting tasks; `Infinity` for an unbounded queue. */
  maxQueue?: number;
  name?: string;
}

export interface PoolStats {
  size: number;
  active: number;
  queued: number;
  completed: number;
  failed: number;
}

interface QueuedTask {
  label: string;
  execute: () => void;
  reject: (err: Error) => void;
}

/**
 * Bounded executor for snapshot provider calls.
 *
 * At most `size` tasks run at once; the rest wait in a FIFO queue of at most
 * `maxQueue` entries. Submissions past that bound reject with PoolSaturatedError.
 * A task that throws rejects its own caller with ProviderFailureError and the
 * slot is handed to the next queued task.
 */
export class OffloadPool {
  readonly size: number;
  readonly maxQueue: number;
  readonly name: string;

  private active = 0;
  private completed = 0;
  private failed = 0;
  private closed = false;
  private readonly queue: QueuedTask[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(options: OffloadPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(
        `OffloadPool size must be a positive integer, got ${options.size}`,
      );
    }
    this.size = options.size;
    this.maxQueue = options.maxQueue ?? 64;
    this.name = options.name ?? 'offload';
  }

  /**
   * Runs `task` once a slot is free.
   * @param label - provider name, used in ProviderFailureError
   */
  run<T>(label: string, task: () => T | Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        new PoolSaturatedError(`Offload pool "${this.name}" is closed`),
      );
    }

    return new Promise<T>((resolve, reject) => {
      const execute = () => {
        this.active++;
        // task() may throw synchronously; Promise.resolve().then captures both cases
        Promise.resolve()
          .then(task)
          .then(
            value => {
              this.completed++;
              resolve(value);
            },
            (err: unknown) => {
              this.failed++;
              reject(new ProviderFailureError(label, err));
            },
          )
          .finally(() => {
            this.active--;
            this.next();
          });
      };

      if (this.active < this.size) {
        execute();
        return;
      }
      if (this.queue.length >= this.maxQueue) {
        reject(
          new PoolSaturatedError(
            `Offload pool "${this.name}" is saturated (${this.active} active, ${this.queue.length} queued)`,
          ),
        );
        return;
      }
      this.queue.push({ label, execute, reject });
    });
  }

  stats(): PoolStats {
    return {
      size: this.size,
      active: this.active,
      queued: this.queue.length,
      completed: this.completed,
      failed: this.failed,
    };
  }

  /**
   * Stops accepting work, rejects everything still queued and resolves once
   * the running tasks have settled.
   */
  close(): Promise<void> {
    this.closed = true;
    for (const queued of this.queue.splice(0)) {
      queued.reject(
        new PoolSaturatedError(
          `Offload pool "${this.name}" closed before ${queued.label} ran`,
        ),
      );
    }
    if (this.active === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private next() {
    const queued = this.queue.shift();
    if (queued) {
      queued.execute();
      return;
    }
    if (this.active === 0 && this.idleWaiters.length) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }
}
