import assert from 'node:assert/strict';
import { spawnSync } from 'node:child_process';
import { existsSync, writeFileSync } from 'node:fs';
import test from 'node:test';
import { createTempRepo, fakeRunner, waitFor } from '../test/helpers.js';
import { formatStatus } from './status.js';
import { isStopRequested, pidFilePath, requestStop, startWorkers, stopFilePath, workerPid } from './worker_cmd.js';

test('workers run until the stop marker appears, then clean up', async () => {
  const { repo, dbPath } = createTempRepo();
  for (let i = 0; i < 4; i++) {
    repo.enqueue({ id: `wj${i}`, command: 'echo x', max_retries: 1 }, new Date().toISOString());
  }

  const running = startWorkers(repo, dbPath, {
    count: 2,
    pollIntervalMs: 5,
    run: fakeRunner(),
    handleSignals: false,
  });
  assert.equal(workerPid(dbPath), process.pid);

  await waitFor(() => repo.countByState().completed === 4);
  requestStop(dbPath);
  assert.equal(isStopRequested(dbPath), true);
  const handled = await running;

  assert.equal(handled, 4);
  assert.equal(existsSync(pidFilePath(dbPath)), false);
  assert.equal(existsSync(stopFilePath(dbPath)), false);
  assert.equal(workerPid(dbPath), null);
});

test('a stale stop marker is cleared on start', async () => {
  const { repo, dbPath } = createTempRepo();
  requestStop(dbPath);

  const running = startWorkers(repo, dbPath, {
    count: 1,
    pollIntervalMs: 5,
    run: fakeRunner(),
    handleSignals: false,
  });
  assert.equal(isStopRequested(dbPath), false);

  requestStop(dbPath);
  assert.equal(await running, 0);
});

test('a pid file left by a dead process reads as not running', () => {
  const { repo, dbPath } = createTempRepo();
  const exited = spawnSync('true').pid;
  assert.equal(typeof exited, 'number');
  writeFileSync(pidFilePath(dbPath), String(exited));

  assert.equal(workerPid(dbPath), null);
  assert.equal(formatStatus(repo, dbPath).split('\n').at(-1), 'Workers: not running');
});

test('a live pid in the pid file reads as running', () => {
  const { repo, dbPath } = createTempRepo();
  writeFileSync(pidFilePath(dbPath), String(process.pid));

  assert.equal(workerPid(dbPath), process.pid);
  assert.equal(formatStatus(repo, dbPath).split('\n').at(-1), `Workers: running (pid ${process.pid})`);
});

test('an invalid worker count leaves no pid file behind', async () => {
  const { repo, dbPath } = createTempRepo();

  await assert.rejects(
    startWorkers(repo, dbPath, { count: 0, pollIntervalMs: 5, run: fakeRunner(), handleSignals: false }),
    RangeError,
  );
  assert.equal(existsSync(pidFilePath(dbPath)), false);
});
