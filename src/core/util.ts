export const sleep = (ms = 0) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying up to `retries` more times with `retryIntervalMs`
 * between tries. The last error is rethrown.
 */
export const retry = async <T>(
  fn: () => Promise<T> | T,
  { retries, retryIntervalMs }: { retries: number; retryIntervalMs: number },
): Promise<T> => {
  try {
    return await fn();
  } catch (error) {
    if (retries <= 0) {
      throw error;
    }
    await sleep(retryIntervalMs);
    return retry(fn, { retries: retries - 1, retryIntervalMs });
  }
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

/**
 * Send `signal` to a pid (negative for a process group). Returns false when
 * no such process exists; EPERM means it exists but belongs to someone else.
 */
export function signalProcess(pid: number, signal: NodeJS.Signals | 0): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ESRCH') return false;
    if (code === 'EPERM') return true;
    throw err;
  }
}

export const isProcessAlive = (pid: number) => signalProcess(pid, 0);
