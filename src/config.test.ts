import assert from 'node:assert/strict';
import { resolve } from 'node:path';
import test from 'node:test';
import { loadSettings } from './config.js';

test('loadSettings falls back to defaults', () => {
  assert.deepEqual(loadSettings({}), {
    dbPath: resolve('./queue.db'),
    pollIntervalMs: 200,
    logLevel: 'info',
    dashboardPort: 3000,
  });
});

test('loadSettings reads the environment and ignores junk numbers', () => {
  const settings = loadSettings({
    QUEUECTL_DB: '/tmp/q/jobs.db',
    QUEUECTL_POLL_INTERVAL_MS: '50',
    QUEUECTL_LOG_LEVEL: 'DEBUG',
    QUEUECTL_DASHBOARD_PORT: 'eighty',
  });

  assert.equal(settings.dbPath, '/tmp/q/jobs.db');
  assert.equal(settings.pollIntervalMs, 50);
  assert.equal(settings.logLevel, 'debug');
  assert.equal(settings.dashboardPort, 3000);
});
