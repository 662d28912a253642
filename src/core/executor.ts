import { execa, ExecaError } from 'execa';
import { logger } from './logger.js';
import type { ExecutionResult } from './types.js';
import { errorMessage, signalProcess } from './util.js';

export interface RunOptions {
  timeoutMs?: number;
}

export type CommandRunner = (command: string, options?: RunOptions) => Promise<ExecutionResult>;

// On POSIX the shell leads its own process group so a timeout reaches
// everything it forked, not just sh.
const OWN_GROUP = process.platform !== 'win32';

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function describeFailure(err: ExecaError, timedOut: boolean, timeoutMs: number | undefined): string {
  if (timedOut) {
    return `Timed out after ${(timeoutMs ?? 0) / 1000}s`;
  }
  if (err.exitCode !== undefined) {
    const stderr = text(err.stderr).trim();
    return stderr ? `Exit ${err.exitCode}: ${stderr.slice(0, 200)}` : `Exit ${err.exitCode}`;
  }
  if (err.signal) {
    return `Killed by ${err.signal}`;
  }
  return err.shortMessage;
}

/**
 * Run a job command through the system shell. A failing command resolves
 * with ok=false; this never rejects.
 */
export const runCommand: CommandRunner = async (command, options = {}) => {
  const start = Date.now();
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;

  try {
    // Run through the platform shell (sh on Linux, cmd on Windows)
    const subprocess = execa(command, {
      shell: true,
      all: true,
      stdin: 'ignore',
      windowsHide: true,
      detached: OWN_GROUP,
    });

    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        const pid = subprocess.pid;
        try {
          if (!OWN_GROUP || pid === undefined || !signalProcess(-pid, 'SIGKILL')) {
            subprocess.kill('SIGKILL');
          }
        } catch (err) {
          logger.warn(`Could not kill timed out command (pid ${pid}): ${errorMessage(err)}`);
          subprocess.kill('SIGKILL');
        }
      }, options.timeoutMs);
    }

    const proc = await subprocess;
    return {
      ok: true,
      exitCode: proc.exitCode ?? 0,
      stdout: text(proc.stdout),
      stderr: text(proc.stderr),
      error: null,
      durationMs: Date.now() - start,
    };
  } catch (err) {
    if (err instanceof ExecaError) {
      return {
        ok: false,
        exitCode: err.exitCode ?? null,
        stdout: text(err.stdout),
        stderr: text(err.stderr),
        error: describeFailure(err, timedOut, options.timeoutMs),
        durationMs: Date.now() - start,
      };
    }
    return {
      ok: false,
      exitCode: null,
      stdout: '',
      stderr: '',
      error: errorMessage(err),
      durationMs: Date.now() - start,
    };
  } finally {
    clearTimeout(timer);
  }
};
