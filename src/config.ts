import { resolve } from 'node:path';
import type { LogLevelDesc } from 'loglevel';

export interface Settings {
  dbPath: string;
  pollIntervalMs: number;
  logLevel: LogLevelDesc;
  dashboardPort: number;
}

const DEFAULT_DB_PATH = './queue.db';
const DEFAULT_POLL_INTERVAL_MS = 200;
const DEFAULT_DASHBOARD_PORT = 3000;
const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

function positiveInt(raw: string | undefined, def: number): number {
  if (raw === undefined || raw.trim() === '') return def;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : def;
}

function logLevel(raw: string | undefined): LogLevelDesc {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === wanted) ?? 'info';
}

/**
 * Process settings from the environment. Runtime tunables such as the
 * backoff base live in the database config table instead.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    dbPath: resolve(env.QUEUECTL_DB ?? DEFAULT_DB_PATH),
    pollIntervalMs: positiveInt(env.QUEUECTL_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
    logLevel: logLevel(env.QUEUECTL_LOG_LEVEL),
    dashboardPort: positiveInt(env.QUEUECTL_DASHBOARD_PORT, DEFAULT_DASHBOARD_PORT),
  };
}
