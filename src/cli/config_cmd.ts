import type { JobRepo } from '../db/repo.js';
import { CONFIG_DEFAULTS, isConfigKey, parseConfigValue } from '../core/config_values.js';

/**
 * All config values, known keys filled with their defaults. Numeric
 * strings are shown as numbers.
 */
export function getConfigAll(repo: JobRepo): Record<string, string | number> {
  const res: Record<string, string | number> = { ...CONFIG_DEFAULTS };

  for (const [key, value] of Object.entries(repo.listConfig())) {
    const num = Number(value);
    res[key] = value.trim() === '' || isNaN(num) ? value : num;
  }

  return res;
}

export function getConfigValue(repo: JobRepo, key: string): string | number | undefined {
  return getConfigAll(repo)[key];
}

/**
 * Known keys are validated before anything is stored; a bad value throws
 * InvalidConfigError and leaves the previous value in place.
 */
export function setConfigKV(repo: JobRepo, key: string, value: string) {
  if (isConfigKey(key)) {
    parseConfigValue(key, value);
  }
  repo.setConfig(key, value.trim());
}
