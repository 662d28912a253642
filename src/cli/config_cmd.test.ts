import assert from 'node:assert/strict';
import test from 'node:test';
import { parseConfigValue } from '../core/config_values.js';
import { InvalidConfigError } from '../core/errors.js';
import { createTempRepo } from '../test/helpers.js';
import { getConfigAll, getConfigValue, setConfigKV } from './config_cmd.js';

test('defaults are reported for keys never set', () => {
  const { repo } = createTempRepo();

  assert.deepEqual(getConfigAll(repo), { backoff_base: 2, job_timeout_sec: 60, default_max_retries: 3 });
});

test('set values are read back fresh', () => {
  const { repo } = createTempRepo();

  setConfigKV(repo, 'backoff_base', '1.5');
  setConfigKV(repo, 'note', 'nightly');

  assert.equal(getConfigValue(repo, 'backoff_base'), 1.5);
  assert.equal(getConfigValue(repo, 'note'), 'nightly');
  assert.equal(getConfigValue(repo, 'missing'), undefined);
});

test('invalid values for known keys are refused and not stored', () => {
  const { repo } = createTempRepo();

  for (const bad of ['0', '-2', 'abc', '', 'Infinity']) {
    assert.throws(() => setConfigKV(repo, 'backoff_base', bad), InvalidConfigError);
  }
  assert.throws(() => setConfigKV(repo, 'default_max_retries', '1.5'), InvalidConfigError);
  assert.equal(repo.getConfig('backoff_base'), '2');
  assert.equal(repo.getConfig('default_max_retries'), undefined);
});

test('parseConfigValue falls back to defaults only for missing values', () => {
  assert.equal(parseConfigValue('backoff_base', undefined), 2);
  assert.equal(parseConfigValue('job_timeout_sec', null), 60);
  assert.equal(parseConfigValue('backoff_base', ' 3 '), 3);
  assert.throws(() => parseConfigValue('backoff_base', ' '), InvalidConfigError);
});
