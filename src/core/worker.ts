import type { JobRepo } from '../db/repo.js';
import { parseConfigValue, CONFIG_DEFAULTS } from './config_values.js';
import { runCommand, type CommandRunner } from './executor.js';
import { logger } from './logger.js';
import { applyOutcome, toOutcome } from './state_machine.js';
import type { ExecutionResult, Job, StopSignal } from './types.js';
import { errorMessage, retry, sleep } from './util.js';

export const DEFAULT_POLL_INTERVAL_MS = 200;

export interface WorkerOptions {
  repo: JobRepo;
  workerId: string;
  stopSignal: StopSignal;
  pollIntervalMs?: number;
  run?: CommandRunner;
  now?: () => Date;
  /** Extra attempts at writing an outcome before the job is left in processing. */
  writeRetries?: number;
  writeRetryIntervalMs?: number;
}

/**
 * Claim, execute and record jobs until the stop signal is set. The signal is
 * only checked between jobs, so a running command always finishes and gets
 * its outcome written first. Resolves with the number of jobs handled.
 */
export async function workerLoop(options: WorkerOptions): Promise<number> {
  const { repo, workerId, stopSignal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const now = options.now ?? (() => new Date());
  let handled = 0;

  logger.info(`[${workerId}] started`);

  while (!stopSignal.stop) {
    let job: Job | undefined;
    try {
      job = repo.claimJob(now().toISOString(), workerId);
    } catch (err) {
      logger.warn(`[${workerId}] claim failed, retrying: ${errorMessage(err)}`);
      job = undefined;
    }

    if (!job) {
      await sleep(pollIntervalMs); // idle wait
      continue;
    }

    await runJob(options, job, now);
    handled++;
  }

  logger.info(`[${workerId}] exiting after ${handled} job(s)`);
  return handled;
}

function jobTimeoutMs(repo: JobRepo, workerId: string): number {
  try {
    return parseConfigValue('job_timeout_sec', repo.getConfig('job_timeout_sec')) * 1000;
  } catch (err) {
    logger.warn(`[${workerId}] ${errorMessage(err)}; using ${CONFIG_DEFAULTS.job_timeout_sec}s`);
    return CONFIG_DEFAULTS.job_timeout_sec * 1000;
  }
}

async function execute(run: CommandRunner, command: string, timeoutMs: number): Promise<ExecutionResult> {
  const start = Date.now();
  try {
    return await run(command, { timeoutMs });
  } catch (err) {
    return {
      ok: false,
      exitCode: null,
      stdout: '',
      stderr: '',
      error: errorMessage(err),
      durationMs: Date.now() - start,
    };
  }
}

async function runJob(options: WorkerOptions, job: Job, now: () => Date) {
  const { repo, workerId } = options;
  const run = options.run ?? runCommand;

  logger.info(`[${workerId}] picked job ${job.id} (attempt ${job.attempts}) -> ${job.command}`);
  const result = await execute(run, job.command, jobTimeoutMs(repo, workerId));
  const outcome = toOutcome(result);

  if (result.stdout.trim()) logger.debug(`[${workerId}] output of ${job.id}:\n${result.stdout}`);

  try {
    const transition = await retry(() => applyOutcome(repo, job, outcome, now()), {
      retries: options.writeRetries ?? 3,
      retryIntervalMs: options.writeRetryIntervalMs ?? 500,
    });

    switch (transition.to) {
      case 'completed':
        logger.info(`[${workerId}] job ${job.id} completed in ${result.durationMs}ms`);
        break;
      case 'failed':
        logger.warn(
          `[${workerId}] job ${job.id} failed (attempt ${job.attempts}): ${result.error}; retry at +${transition.delaySeconds}s`,
        );
        break;
      case 'dead':
        logger.error(`[${workerId}] job ${job.id} moved to DLQ after ${job.attempts} attempts: ${result.error}`);
        break;
    }
  } catch (err) {
    logger.error(
      `[${workerId}] could not record outcome of job ${job.id}, leaving it in processing: ${errorMessage(err)}`,
    );
  }
}
