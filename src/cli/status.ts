import type { JobRepo } from '../db/repo.js';
import { JOB_STATES } from '../core/types.js';
import { workerPid } from './worker_cmd.js';

export function formatStatus(repo: JobRepo, dbPath: string): string {
  const counts = repo.countByState();
  const metrics = repo.metrics();
  const pid = workerPid(dbPath);
  const lines = ['Job states:'];

  for (const s of JOB_STATES) {
    lines.push(`  ${s.padEnd(10)} ${counts[s]}`);
  }
  lines.push(`Oldest pending: ${repo.oldestPending() ?? '-'}`);
  lines.push('Metrics:');
  for (const [key, value] of Object.entries(metrics)) {
    lines.push(`  ${key.padEnd(14)} ${value}`);
  }
  lines.push(`Workers: ${pid ? `running (pid ${pid})` : 'not running'}`);
  return lines.join('\n');
}

export function printStatus(repo: JobRepo, dbPath: string) {
  console.log(formatStatus(repo, dbPath));
}
