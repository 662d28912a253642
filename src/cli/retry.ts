import type { JobRepo } from '../db/repo.js';
import type { Job } from '../core/types.js';

/**
 * Revive a dead job: back to pending with attempts reset to 0.
 * Throws NotFoundError or InvalidStateError when the job is not in the DLQ.
 */
export function retryFromDLQ(repo: JobRepo, id: string, now: Date = new Date()): Job {
  return repo.dlqRetry(id, now.toISOString());
}
