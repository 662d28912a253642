import assert from 'node:assert/strict';
import test from 'node:test';
import { createTempRepo } from '../test/helpers.js';
import { formatJobLines, formatJobTable } from './format.js';
import { formatStatus } from './status.js';

const T0 = '2026-01-01T00:00:00.000Z';

test('formatJobTable aligns columns', () => {
  const { repo } = createTempRepo();
  repo.enqueue({ id: 'a', command: 'echo a', max_retries: 2 }, T0);
  repo.enqueue({ id: 'long-id', command: 'false', max_retries: 0 }, T0);

  assert.equal(
    formatJobTable(repo.listJobs()),
    [
      'ID       STATE    ATTEMPTS  NEXT RUN  COMMAND',
      'a        pending  0/3       -         echo a',
      'long-id  pending  0/1       -         false',
    ].join('\n'),
  );
  assert.equal(formatJobTable([]), '(no jobs)');
});

test('formatJobLines prints one JSON object per job', () => {
  const { repo } = createTempRepo();
  const job = repo.enqueue({ id: 'a', command: 'true', max_retries: 0 }, T0);

  assert.deepEqual(JSON.parse(formatJobLines(repo.listJobs())), job);
});

test('formatStatus lists counts, metrics and worker state', () => {
  const { repo, dbPath } = createTempRepo();
  repo.enqueue({ id: 'a', command: 'true', max_retries: 0 }, T0);
  repo.incrementMetric('jobs_processed', 2);

  assert.equal(
    formatStatus(repo, dbPath),
    [
      'Job states:',
      '  pending    1',
      '  processing 0',
      '  completed  0',
      '  failed     0',
      '  dead       0',
      `Oldest pending: ${T0}`,
      'Metrics:',
      '  jobs_processed 2',
      '  jobs_failed    0',
      '  jobs_retried   0',
      '  jobs_dead      0',
      'Workers: not running',
    ].join('\n'),
  );
});
