/**
 * Task Pool - bounded concurrency for pipeline runs
 *
 * Features:
 * - Configurable max concurrency (semaphore-based)
 * - FIFO queue for work beyond the limit
 * - Drain: stop accepting work, wait for running tasks, reject queued ones
 */

import { createLogger, type Logger } from './log';

// ============================================
// Types
// ============================================

export type PoolConfig = {
  /** Max tasks running at once */
  maxConcurrency: number;
  /** Enable debug logging */
  debug?: boolean;
  logger?: Logger;
};

type QueuedTask<T> = {
  execute: () => Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
};

export class PoolClosedError extends Error {
  constructor() {
    super('pool is closed');
    this.name = 'PoolClosedError';
  }
}

// ============================================
// Pool Implementation
// ============================================

export class TaskPool {
  private maxConcurrency: number;
  private logger: Logger;
  private inFlight = 0;
  private queue: QueuedTask<unknown>[] = [];
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(config: PoolConfig) {
    this.maxConcurrency = Math.max(1, Math.floor(config.maxConcurrency));
    this.logger = config.logger ?? createLogger('pool', { debug: config.debug });
  }

  /**
   * Run `execute` as soon as a slot is free
   */
  run<T>(execute: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new PoolClosedError());

    if (this.inFlight < this.maxConcurrency) {
      return this.runTask(execute);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        execute,
        resolve: (value) => resolve(value as T),
        reject,
      });
      this.logger.debug('queued task', { queued: this.queue.length });
    });
  }

  /**
   * Get current pool stats
   */
  getStats() {
    return {
      inFlight: this.inFlight,
      queued: this.queue.length,
      maxConcurrency: this.maxConcurrency,
      closed: this.closed,
    };
  }

  /**
   * Refuse new work, reject everything still queued, and resolve once running
   * tasks have settled.
   */
  async drain(): Promise<void> {
    this.closed = true;
    const pending = this.queue.splice(0);
    for (const task of pending) task.reject(new PoolClosedError());
    if (this.inFlight === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  // ============================================
  // Private Methods
  // ============================================

  private async runTask<T>(execute: () => Promise<T>): Promise<T> {
    this.inFlight++;
    this.logger.debug('starting task', { in_flight: this.inFlight });

    try {
      return await execute();
    } finally {
      this.inFlight--;
      this.logger.debug('completed task', { in_flight: this.inFlight });
      this.processQueue();
    }
  }

  private processQueue() {
    if (this.inFlight === 0 && this.queue.length === 0) {
      for (const wake of this.idleWaiters.splice(0)) wake();
      return;
    }
    if (this.inFlight >= this.maxConcurrency) return;

    const task = this.queue.shift();
    if (!task) return;
    this.runTask(task.execute).then(task.resolve, task.reject);
  }
}
