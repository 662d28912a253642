import type { JobRepo } from '../db/repo.js';
import { decide } from './backoff.js';
import { parseConfigValue } from './config_values.js';
import { ExecutionFailure } from './errors.js';
import { JOB_STATES, type ExecutionResult, type Job, type JobOutput, type JobState } from './types.js';

export const TRANSITIONS: Readonly<Record<JobState, readonly JobState[]>> = {
  pending: ['processing'],
  // failed jobs go back through the claim once next_run_at has passed
  failed: ['processing'],
  processing: ['completed', 'failed', 'dead'],
  completed: [],
  dead: ['pending'],
};

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** States a job may be in for a move to `to`. */
export function sourcesOf(to: JobState): JobState[] {
  return JOB_STATES.filter((from) => canTransition(from, to));
}

export type Outcome =
  | { ok: true; output: JobOutput }
  | { ok: false; failure: ExecutionFailure; output: JobOutput };

export type Transition =
  | { to: 'completed' }
  | { to: 'failed'; delaySeconds: number; nextRunAt: string }
  | { to: 'dead' };

const MAX_OUTPUT = 4000;
// Past year 9999 toISOString() switches to a signed six-digit year, which
// would break the lexical next_run_at comparison in the claim.
const MAX_TIME_MS = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

export function truncate(s: string, max = MAX_OUTPUT) {
  if (s.length <= max) return s;
  return s.slice(0, max) + `\n...[truncated ${s.length - max} chars]`;
}

/** Only success vs failure matters; why a run failed is kept for last_error. */
export function toOutcome(result: ExecutionResult): Outcome {
  const output: JobOutput = {
    stdout: result.stdout ? truncate(result.stdout) : null,
    stderr: result.stderr ? truncate(result.stderr) : null,
  };
  if (result.ok) {
    return { ok: true, output };
  }
  return { ok: false, failure: new ExecutionFailure(result), output };
}

/**
 * Record the outcome of one execution of a claimed job.
 *
 * `job` must be the snapshot returned by the claim; it is not re-read, so
 * attempts and max_retries are the values the execution started with. The
 * backoff base is read from config on every call.
 */
export function applyOutcome(repo: JobRepo, job: Job, outcome: Outcome, now: Date = new Date()): Transition {
  const nowIso = now.toISOString();

  if (outcome.ok) {
    repo.transaction(() => {
      repo.markCompleted(job.id, nowIso, outcome.output);
      repo.incrementMetric('jobs_processed');
    });
    return { to: 'completed' };
  }

  const backoffBase = parseConfigValue('backoff_base', repo.getConfig('backoff_base'));
  const decision = decide(job.attempts, job.max_retries, backoffBase);
  const error = truncate(outcome.failure.message);

  if (decision.kind === 'exhausted') {
    repo.transaction(() => {
      repo.markDead(job.id, nowIso, error, outcome.output);
      repo.incrementMetric('jobs_failed');
      repo.incrementMetric('jobs_dead');
    });
    return { to: 'dead' };
  }

  const nextRunAt = new Date(Math.min(now.getTime() + decision.delaySeconds * 1000, MAX_TIME_MS)).toISOString();
  repo.transaction(() => {
    repo.markRetry(job.id, nextRunAt, nowIso, error, outcome.output);
    repo.incrementMetric('jobs_failed');
    repo.incrementMetric('jobs_retried');
  });
  return { to: 'failed', delaySeconds: decision.delaySeconds, nextRunAt };
}
