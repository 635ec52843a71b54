/**
 * Worker Pool - bounded concurrent task runner
 *
 * submit() resolves once the task has started. When every slot is busy the
 * caller waits in a FIFO queue for a free slot, which gives the producer
 * back-pressure. Task failures are logged, never rethrown.
 */

import { BotError, describeError } from "./errors.js";
import { ConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export type Task = () => Promise<void>;

interface Waiter {
  task: Task;
  label: string;
  started: () => void;
  reject: (err: Error) => void;
}

export class PoolClosedError extends BotError {
  constructor() {
    super("Worker pool is closed");
  }
}

export class WorkerPool {
  private running: Set<Promise<void>> = new Set();
  private waiters: Waiter[] = [];
  private closed = false;
  private logger: Logger;

  constructor(
    readonly size: number,
    logger?: Logger
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`);
    }
    this.logger = logger ?? new ConsoleLogger();
  }

  /**
   * Start a task once a slot is free
   *
   * @throws PoolClosedError after abandon(), or when abandoned while waiting
   */
  submit(task: Task, label = "task"): Promise<void> {
    if (this.closed) return Promise.reject(new PoolClosedError());

    if (this.running.size < this.size) {
      this.launch(task, label);
      return Promise.resolve();
    }

    return new Promise<void>((started, reject) => {
      this.waiters.push({ task, label, started, reject });
    });
  }

  private launch(task: Task, label: string): void {
    const promise: Promise<void> = new Promise<void>((resolve) => resolve(task()))
      .catch((err) => {
        this.logger.error(`${label} failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.running.delete(promise);
        // Hand the freed slot straight to the next waiter
        const next = this.waiters.shift();
        if (next) {
          this.launch(next.task, next.label);
          next.started();
        }
      });
    this.running.add(promise);
  }

  /** Tasks currently running */
  get active(): number {
    return this.running.size;
  }

  /** Submissions waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait until nothing is running or queued
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  /**
   * Stop admitting work and reject queued submissions. Running tasks
   * continue unobserved.
   */
  abandon(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(new PoolClosedError());
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
