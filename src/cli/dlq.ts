import type { JobRepo } from '../db/repo.js';
import { formatJobLines } from './format.js';

export function printDLQ(repo: JobRepo, json = false) {
  const jobs = repo.listJobs('dead');
  if (json) {
    console.log(formatJobLines(jobs));
    return;
  }
  if (jobs.length === 0) {
    console.log('DLQ is empty');
    return;
  }
  for (const j of jobs) {
    console.log(`${j.id}  attempts=${j.attempts}  failed_at=${j.updated_at}  ${j.command}`);
    if (j.last_error) console.log(`  last error: ${j.last_error}`);
  }
}
