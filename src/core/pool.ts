import type { JobRepo } from '../db/repo.js';
import type { CommandRunner } from './executor.js';
import { logger } from './logger.js';
import type { StopSignal } from './types.js';
import { workerLoop } from './worker.js';

export interface PoolOptions {
  repo: JobRepo;
  count: number;
  pollIntervalMs?: number;
  run?: CommandRunner;
  now?: () => Date;
}

/**
 * Owns a fixed number of worker loops sharing one stop signal. Stopping is
 * cooperative: each loop finishes the job it holds before it exits.
 */
export class WorkerPool {
  readonly stopSignal: StopSignal = { stop: false };
  private loops: Promise<number>[] = [];

  constructor(private readonly options: PoolOptions) {
    if (!Number.isInteger(options.count) || options.count < 1) {
      throw new RangeError(`Worker count must be a positive integer, got ${options.count}`);
    }
  }

  get running(): boolean {
    return this.loops.length > 0 && !this.stopSignal.stop;
  }

  start() {
    if (this.loops.length > 0) {
      throw new Error('Worker pool already started');
    }
    const { repo, count, pollIntervalMs, run, now } = this.options;
    logger.info(`Starting ${count} worker(s)`);
    for (let i = 1; i <= count; i++) {
      this.loops.push(
        workerLoop({ repo, workerId: `worker-${i}`, stopSignal: this.stopSignal, pollIntervalMs, run, now }),
      );
    }
  }

  stop() {
    if (!this.stopSignal.stop) {
      logger.info('Stop requested, workers exit after their current job');
    }
    this.stopSignal.stop = true;
  }

  /** Wait for every loop to exit; resolves with the total jobs handled. */
  async join(): Promise<number> {
    const handled = await Promise.all(this.loops);
    return handled.reduce((a, b) => a + b, 0);
  }
}
