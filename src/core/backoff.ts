import { InvalidConfigError } from './errors.js';

export const DEFAULT_BACKOFF_BASE = 2;

export type BackoffDecision =
  | { kind: 'retry'; delaySeconds: number }
  | { kind: 'exhausted' };

/**
 * Decide what happens to a job whose execution just failed.
 *
 * `attempts` is the count recorded by the claim that started the failed
 * execution, so the first failure has attempts = 1 and waits base^1.
 */
export function decide(attempts: number, maxRetries: number, backoffBase: number): BackoffDecision {
  if (!Number.isFinite(backoffBase) || backoffBase <= 0) {
    throw new InvalidConfigError('backoff_base', `backoff_base must be a positive number, got ${backoffBase}`);
  }
  if (!Number.isInteger(attempts) || attempts < 0) {
    throw new InvalidConfigError('attempts', `attempts must be a non-negative integer, got ${attempts}`);
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new InvalidConfigError('max_retries', `max_retries must be a non-negative integer, got ${maxRetries}`);
  }

  if (attempts > maxRetries) {
    return { kind: 'exhausted' };
  }
  return { kind: 'retry', delaySeconds: Math.pow(backoffBase, attempts) };
}
