import { z } from 'zod';
import { DEFAULT_BACKOFF_BASE } from './backoff.js';
import { InvalidConfigError } from './errors.js';
import type { Config, ConfigKey } from './types.js';

const positiveNumber = z.coerce.number().finite().positive();

const schemas: Record<ConfigKey, z.ZodNumber> = {
  backoff_base: positiveNumber,
  job_timeout_sec: positiveNumber,
  default_max_retries: z.coerce.number().int().nonnegative(),
};

export const CONFIG_DEFAULTS: Config = {
  backoff_base: DEFAULT_BACKOFF_BASE,
  job_timeout_sec: 60,
  default_max_retries: 3,
};

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(schemas, key);
}

/**
 * Turn a stored config string into its typed value. Missing values give the
 * default; malformed ones throw instead of being coerced.
 */
export function parseConfigValue(key: ConfigKey, raw: string | null | undefined): number {
  if (raw === null || raw === undefined) return CONFIG_DEFAULTS[key];
  // z.coerce turns '' into 0, which would slip through nonnegative()
  const parsed = raw.trim() === '' ? undefined : schemas[key].safeParse(raw.trim());
  if (!parsed?.success) {
    throw new InvalidConfigError(key, `Invalid value for ${key}: "${raw}"`);
  }
  return parsed.data;
}
