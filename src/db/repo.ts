import type Database from 'better-sqlite3';
import { DuplicateIdError, InvalidStateError, NotFoundError } from '../core/errors.js';
import {
  isMetricKey,
  type Job,
  type JobOutput,
  type JobState,
  type MetricKey,
  type StateCounts,
} from '../core/types.js';
import { canTransition, sourcesOf } from '../core/state_machine.js';

export interface NewJob {
  id: string;
  command: string;
  max_retries: number;
}

export interface JobRepo {
  readonly db: Database.Database;
  enqueue(job: NewJob, nowIso: string): Job;
  claimJob(nowIso: string, workerId?: string): Job | undefined;
  markCompleted(id: string, nowIso: string, output?: JobOutput): void;
  markRetry(id: string, nextRunIso: string, nowIso: string, error?: string, output?: JobOutput): void;
  markDead(id: string, nowIso: string, error?: string, output?: JobOutput): void;
  dlqRetry(id: string, nowIso: string): Job;
  getJob(id: string): Job | undefined;
  listJobs(state?: JobState): Job[];
  countByState(): StateCounts;
  oldestPending(): string | null;
  getConfig(key: string): string | undefined;
  setConfig(key: string, value: string): void;
  listConfig(): Record<string, string>;
  incrementMetric(key: MetricKey, by?: number): void;
  metrics(): Record<MetricKey, number>;
  transaction<T>(fn: () => T): T;
  close(): void;
}

interface ConfigRow {
  key: string;
  value: string;
}

interface MetricRow {
  key: string;
  value: number;
}

const EMPTY_OUTPUT: JobOutput = { stdout: null, stderr: null };

/** SQL guard admitting only rows whose state may move to `to`. */
function fromStates(to: JobState): string {
  return `state IN (${sourcesOf(to)
    .map((s) => `'${s}'`)
    .join(', ')})`;
}

export function createRepo(db: Database.Database): JobRepo {
  const insertStmt = db.prepare<[NewJob & { now: string }], Job>(`
    INSERT INTO jobs (
      id, command, state, attempts, max_retries,
      created_at, updated_at, next_run_at
    ) VALUES (
      @id, @command, 'pending', 0, @max_retries,
      @now, @now, @now
    )
    ON CONFLICT (id) DO NOTHING
    RETURNING *
  `);

  // Select and update happen in one statement so two claimers can never
  // both see the same row as eligible.
  const claimStmt = db.prepare<[{ now: string; workerId: string | null }], Job>(`
    UPDATE jobs
    SET state = 'processing',
        attempts = attempts + 1,
        updated_at = max(created_at, @now),
        worker_id = @workerId
    WHERE id = (
      SELECT id FROM jobs
      WHERE state = 'pending'
         OR (state = 'failed' AND next_run_at <= @now)
      ORDER BY created_at, rowid
      LIMIT 1
    )
      AND (state = 'pending' OR (state = 'failed' AND next_run_at <= @now))
    RETURNING *
  `);

  const completeStmt = db.prepare(`
    UPDATE jobs
    SET state = 'completed', updated_at = max(created_at, @now),
        last_error = NULL, stdout = @stdout, stderr = @stderr
    WHERE id = @id AND ${fromStates('completed')}
  `);

  const retryStmt = db.prepare(`
    UPDATE jobs
    SET state = 'failed', updated_at = max(created_at, @now), next_run_at = @nextRun,
        last_error = @error, stdout = @stdout, stderr = @stderr
    WHERE id = @id AND ${fromStates('failed')}
  `);

  const deadStmt = db.prepare(`
    UPDATE jobs
    SET state = 'dead', updated_at = max(created_at, @now),
        last_error = @error, stdout = @stdout, stderr = @stderr
    WHERE id = @id AND ${fromStates('dead')}
  `);

  const dlqRetryStmt = db.prepare<[{ id: string; now: string }], Job>(`
    UPDATE jobs
    SET state = 'pending', attempts = 0, updated_at = max(created_at, @now),
        next_run_at = @now, last_error = NULL, worker_id = NULL
    WHERE id = @id AND ${fromStates('pending')}
    RETURNING *
  `);

  const getStmt = db.prepare<[string], Job>('SELECT * FROM jobs WHERE id = ?');

  /**
   * A conditional update toward `to` touched nothing: explain why without
   * changing anything.
   */
  function rejectTransition(id: string, to: JobState): never {
    const current = getStmt.get(id);
    if (!current) throw new NotFoundError(id);
    if (canTransition(current.state, to)) {
      throw new Error(`Job "${id}" could not move from ${current.state} to ${to}.`);
    }
    throw new InvalidStateError(id, current.state, sourcesOf(to)[0] ?? to);
  }

  function outputParams(output: JobOutput = EMPTY_OUTPUT) {
    return { stdout: output.stdout, stderr: output.stderr };
  }

  return {
    db,

    /**
     * Insert a new pending job. An existing id is left untouched.
     */
    enqueue(job, nowIso) {
      const row = insertStmt.get({
        id: job.id,
        command: job.command,
        max_retries: job.max_retries,
        now: nowIso,
      });
      if (!row) throw new DuplicateIdError(job.id);
      return row;
    },

    /**
     * Claim the oldest eligible job for processing: pending, or failed with
     * next_run_at <= now.
     */
    claimJob(nowIso, workerId) {
      return claimStmt.get({ now: nowIso, workerId: workerId ?? null });
    },

    markCompleted(id, nowIso, output) {
      const res = completeStmt.run({ id, now: nowIso, ...outputParams(output) });
      if (res.changes === 0) rejectTransition(id, 'completed');
    },

    markRetry(id, nextRunIso, nowIso, error, output) {
      const res = retryStmt.run({
        id,
        now: nowIso,
        nextRun: nextRunIso,
        error: error ?? null,
        ...outputParams(output),
      });
      if (res.changes === 0) rejectTransition(id, 'failed');
    },

    markDead(id, nowIso, error, output) {
      const res = deadStmt.run({ id, now: nowIso, error: error ?? null, ...outputParams(output) });
      if (res.changes === 0) rejectTransition(id, 'dead');
    },

    /**
     * Move a job out of the DLQ back to pending with a fresh attempt budget.
     */
    dlqRetry(id, nowIso) {
      const row = dlqRetryStmt.get({ id, now: nowIso });
      if (!row) rejectTransition(id, 'pending');
      return row;
    },

    getJob(id) {
      return getStmt.get(id);
    },

    listJobs(state) {
      if (state) {
        return db
          .prepare<[string], Job>('SELECT * FROM jobs WHERE state = ? ORDER BY created_at, rowid')
          .all(state);
      }
      return db.prepare<[], Job>('SELECT * FROM jobs ORDER BY created_at, rowid').all();
    },

    countByState() {
      const rows = db
        .prepare<[], { state: JobState; c: number }>('SELECT state, COUNT(*) AS c FROM jobs GROUP BY state')
        .all();
      const counts: StateCounts = { pending: 0, processing: 0, completed: 0, failed: 0, dead: 0 };
      for (const row of rows) {
        counts[row.state] = row.c;
      }
      return counts;
    },

    oldestPending() {
      const row = db
        .prepare<[], { m: string | null }>("SELECT MIN(created_at) AS m FROM jobs WHERE state = 'pending'")
        .get();
      return row?.m ?? null;
    },

    getConfig(key) {
      const row = db.prepare<[string], { value: string }>('SELECT value FROM config WHERE key = ?').get(key);
      return row?.value;
    },

    /**
     * Set or update a config key/value pair
     */
    setConfig(key, value) {
      db.prepare(`
        INSERT INTO config (key, value)
        VALUES (?, ?)
        ON CONFLICT (key)
        DO UPDATE SET value = excluded.value
      `).run(key, value);
    },

    listConfig() {
      const rows = db.prepare<[], ConfigRow>('SELECT key, value FROM config ORDER BY key').all();
      return Object.fromEntries(rows.map((r) => [r.key, r.value]));
    },

    incrementMetric(key, by = 1) {
      db.prepare(`
        INSERT INTO metrics (key, value)
        VALUES (?, ?)
        ON CONFLICT (key)
        DO UPDATE SET value = value + excluded.value
      `).run(key, by);
    },

    metrics() {
      const rows = db.prepare<[], MetricRow>('SELECT key, value FROM metrics').all();
      const res: Record<MetricKey, number> = { jobs_processed: 0, jobs_failed: 0, jobs_retried: 0, jobs_dead: 0 };
      for (const row of rows) {
        if (isMetricKey(row.key)) res[row.key] = row.value;
      }
      return res;
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },

    close() {
      db.close();
    },
  };
}
