export const JOB_STATES = ['pending', 'processing', 'completed', 'failed', 'dead'] as const;

export type JobState = (typeof JOB_STATES)[number];

export interface Job {
  id: string;
  command: string;
  state: JobState;
  attempts: number;
  max_retries: number;
  created_at: string;
  updated_at: string;
  next_run_at: string;
  last_error: string | null;
  stdout: string | null;
  stderr: string | null;
  worker_id: string | null;
}

/** What a client hands to enqueue. */
export interface JobDescriptor {
  id: string;
  command: string;
  max_retries?: number;
}

export type StateCounts = Record<JobState, number>;

export interface JobOutput {
  stdout: string | null;
  stderr: string | null;
}

export interface ExecutionResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error: string | null;
  durationMs: number;
}

export interface StopSignal {
  stop: boolean;
}

export interface Config {
  backoff_base: number;       // e.g. 2
  job_timeout_sec: number;    // e.g. 60
  default_max_retries: number;
}

export type ConfigKey = keyof Config;

export const METRIC_KEYS = ['jobs_processed', 'jobs_failed', 'jobs_retried', 'jobs_dead'] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

export function isJobState(value: string): value is JobState {
  return JOB_STATES.some((s) => s === value);
}

export function isMetricKey(value: string): value is MetricKey {
  return METRIC_KEYS.some((k) => k === value);
}
