import assert from 'node:assert/strict';
import test from 'node:test';
import { InvalidStateError, NotFoundError } from '../core/errors.js';
import { at, createTempRepo } from '../test/helpers.js';
import { retryFromDLQ } from './retry.js';

const T0 = '2026-01-01T00:00:00.000Z';

test('retryFromDLQ revives a dead job', () => {
  const { repo } = createTempRepo();
  repo.enqueue({ id: 'a', command: 'false', max_retries: 0 }, T0);
  repo.claimJob(T0);
  repo.markDead('a', T0, 'Exit 1');

  const job = retryFromDLQ(repo, 'a', at('2026-01-02T00:00:00.000Z'));

  assert.equal(job.state, 'pending');
  assert.equal(job.attempts, 0);
  assert.deepEqual(repo.listJobs('dead'), []);
});

test('retryFromDLQ refuses completed and unknown jobs', () => {
  const { repo } = createTempRepo();
  repo.enqueue({ id: 'a', command: 'true', max_retries: 0 }, T0);
  repo.claimJob(T0);
  repo.markCompleted('a', T0);

  assert.throws(() => retryFromDLQ(repo, 'a'), InvalidStateError);
  assert.throws(() => retryFromDLQ(repo, 'nope'), NotFoundError);
  assert.equal(repo.getJob('a')?.state, 'completed');
});
