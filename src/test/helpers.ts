import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openDB } from '../db/db.js';
import { createRepo, type JobRepo } from '../db/repo.js';
import { setLogLevel } from '../core/logger.js';
import type { CommandRunner } from '../core/executor.js';
import type { ExecutionResult } from '../core/types.js';

setLogLevel('silent');

export interface TempRepo {
  repo: JobRepo;
  dbPath: string;
}

export function createTempRepo(): TempRepo {
  const dir = mkdtempSync(join(tmpdir(), 'queuectl-test-'));
  const dbPath = join(dir, 'queue.db');
  return { repo: createRepo(openDB(dbPath)), dbPath };
}

export function result(ok: boolean, error: string | null = ok ? null : 'Exit 1'): ExecutionResult {
  return { ok, exitCode: ok ? 0 : 1, stdout: '', stderr: '', error, durationMs: 1 };
}

/** A runner that fails for commands containing "fail" and records every call. */
export function fakeRunner(calls: string[] = []): CommandRunner {
  return async (command) => {
    calls.push(command);
    return result(!command.includes('fail'));
  };
}

export const at = (iso: string) => new Date(iso);

export async function waitFor(check: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('Timed out waiting for condition');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
