import type { JobRepo } from '../db/repo.js';
import { ValidationError } from '../core/errors.js';
import { isJobState, JOB_STATES } from '../core/types.js';
import { formatJobLines, formatJobTable } from './format.js';

export function printList(repo: JobRepo, state?: string, json = false) {
  if (state !== undefined && !isJobState(state)) {
    throw new ValidationError(`Unknown state "${state}", expected one of ${JOB_STATES.join('|')}`);
  }
  const jobs = repo.listJobs(state);
  console.log(json ? formatJobLines(jobs) : formatJobTable(jobs));
}
