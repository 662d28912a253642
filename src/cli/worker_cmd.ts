import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { JobRepo } from '../db/repo.js';
import type { CommandRunner } from '../core/executor.js';
import { logger } from '../core/logger.js';
import { WorkerPool } from '../core/pool.js';
import { isProcessAlive } from '../core/util.js';

const STOPFILE = 'queue.worker.stop';
const PIDFILE = 'queue.worker.pid';

export const stopFilePath = (dbPath: string) => join(dirname(dbPath), STOPFILE);
export const pidFilePath = (dbPath: string) => join(dirname(dbPath), PIDFILE);

/** Ask running workers (in any process sharing this database) to stop. */
export function requestStop(dbPath: string) {
  writeFileSync(stopFilePath(dbPath), String(Date.now()));
}

export function isStopRequested(dbPath: string): boolean {
  return existsSync(stopFilePath(dbPath));
}

/**
 * Pid of the live process running workers against this database, if any.
 * A pid file left by a crashed process reads as no workers.
 */
export function workerPid(dbPath: string): number | null {
  const file = pidFilePath(dbPath);
  if (!existsSync(file)) return null;
  const pid = Number(readFileSync(file, 'utf8').trim());
  if (!Number.isInteger(pid) || pid <= 0) return null;
  return isProcessAlive(pid) ? pid : null;
}

export interface StartWorkersOptions {
  count: number;
  pollIntervalMs: number;
  run?: CommandRunner;
  handleSignals?: boolean;
}

/**
 * Run a worker pool in the foreground until `worker stop` is issued or the
 * process gets SIGINT/SIGTERM. Resolves once every worker has exited.
 */
export async function startWorkers(repo: JobRepo, dbPath: string, opts: StartWorkersOptions): Promise<number> {
  const pool = new WorkerPool({ repo, count: opts.count, pollIntervalMs: opts.pollIntervalMs, run: opts.run });
  rmSync(stopFilePath(dbPath), { force: true });
  writeFileSync(pidFilePath(dbPath), String(process.pid));

  const onSignal = () => pool.stop();
  const watcher = setInterval(() => {
    if (isStopRequested(dbPath)) {
      logger.info('Stop requested via CLI');
      pool.stop();
    }
  }, opts.pollIntervalMs);

  if (opts.handleSignals ?? true) {
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  try {
    pool.start();
    return await pool.join();
  } finally {
    clearInterval(watcher);
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    rmSync(pidFilePath(dbPath), { force: true });
    rmSync(stopFilePath(dbPath), { force: true });
  }
}
