import type { Job } from '../core/types.js';

const COLUMNS: { title: string; value: (j: Job) => string }[] = [
  { title: 'ID', value: (j) => j.id },
  { title: 'STATE', value: (j) => j.state },
  { title: 'ATTEMPTS', value: (j) => `${j.attempts}/${j.max_retries + 1}` },
  { title: 'NEXT RUN', value: (j) => (j.state === 'failed' ? j.next_run_at : '-') },
  { title: 'COMMAND', value: (j) => j.command },
];

/** Render jobs as an aligned plain-text table. */
export function formatJobTable(jobs: Job[]): string {
  if (jobs.length === 0) return '(no jobs)';
  const rows = [COLUMNS.map((c) => c.title), ...jobs.map((j) => COLUMNS.map((c) => c.value(j)))];
  const widths = COLUMNS.map((_, i) => Math.max(...rows.map((r) => r[i].length)));
  return rows
    .map((r) => r.map((cell, i) => (i === r.length - 1 ? cell : cell.padEnd(widths[i]))).join('  '))
    .join('\n');
}

export function formatJobLines(jobs: Job[]): string {
  return jobs.map((j) => JSON.stringify(j)).join('\n');
}
