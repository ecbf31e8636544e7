/**
 * Fixed-size worker pool
 * N async worker loops share one job channel; a failing job never stops its worker
 */

import { Channel, ChannelClosedError } from './channel.js';
import { PoolClosedError, PoolConfigurationError, WorkerFault, formatError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

export interface Job {
  id: number;
  run(): Promise<void> | void;
}

export interface WorkerPoolOptions {
  logger?: Logger;
}

export interface WorkerPoolStats {
  size: number;
  active: number;
  pending: number;
  completed: number;
  failed: number;
}

class Worker {
  readonly done: Promise<void>;
  busy = false;
  completed = 0;
  failed = 0;

  constructor(
    readonly id: number,
    private readonly jobs: Channel<Job>,
    private readonly log: Logger,
  ) {
    this.done = this.loop();
  }

  private async loop(): Promise<void> {
    for (;;) {
      const next = await this.jobs.receive();
      if (!next.ok) break;
      await this.execute(next.value);
    }
    this.log.debug(`worker ${this.id} exiting`);
  }

  private async execute(job: Job): Promise<void> {
    this.busy = true;
    this.log.debug(`worker ${this.id} took job ${job.id}`);
    try {
      await this.log.child(() => job.run());
      this.completed++;
    } catch (err) {
      this.failed++;
      this.log.error(formatError(new WorkerFault(this.id, job.id, err)));
    } finally {
      this.busy = false;
    }
  }
}

export class WorkerPool {
  private readonly jobs = new Channel<Job>();
  private readonly workers: Worker[] = [];
  private readonly log: Logger;
  private stopping: Promise<void> | null = null;

  constructor(size: number, opts: WorkerPoolOptions = {}) {
    if (!Number.isInteger(size) || size < 1) {
      throw new PoolConfigurationError(size);
    }
    this.log = opts.logger ?? createLogger('pool');

    for (let id = 0; id < size; id++) {
      this.workers.push(new Worker(id, this.jobs, this.log));
    }
    this.log.debug(`started ${size} workers`);
  }

  /**
   * Queue a job for the next idle worker. The queue is unbounded, so this never waits.
   */
  submit(job: Job): void {
    try {
      this.jobs.send(job);
    } catch (err) {
      if (err instanceof ChannelClosedError) throw new PoolClosedError();
      throw err;
    }
  }

  /**
   * Close the queue, let every worker drain it, and wait for all of them to exit
   */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.log.debug(`shutting down (${this.jobs.length} queued, ${this.activeCount} active)`);
      this.jobs.close();
      this.stopping = Promise.all(this.workers.map((w) => w.done)).then(() => {
        this.log.debug('all workers exited');
      });
    }
    return this.stopping;
  }

  get size(): number {
    return this.workers.length;
  }

  get activeCount(): number {
    return this.workers.filter((w) => w.busy).length;
  }

  get pendingCount(): number {
    return this.jobs.length;
  }

  get completedCount(): number {
    return this.workers.reduce((n, w) => n + w.completed, 0);
  }

  get failedCount(): number {
    return this.workers.reduce((n, w) => n + w.failed, 0);
  }

  get isClosed(): boolean {
    return this.jobs.isClosed;
  }

  stats(): WorkerPoolStats {
    return {
      size: this.size,
      active: this.activeCount,
      pending: this.pendingCount,
      completed: this.completedCount,
      failed: this.failedCount,
    };
  }
}
