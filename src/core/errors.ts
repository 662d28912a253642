import type { ExecutionResult, JobState } from './types.js';

export class QueueError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateIdError extends QueueError {
  constructor(readonly jobId: string) {
    super(`Job with id "${jobId}" already exists.`);
  }
}

export class NotFoundError extends QueueError {
  constructor(readonly jobId: string) {
    super(`Job "${jobId}" not found.`);
  }
}

export class InvalidStateError extends QueueError {
  constructor(
    readonly jobId: string,
    readonly actual: JobState,
    readonly expected: JobState,
  ) {
    super(`Job "${jobId}" is ${actual}, expected ${expected}.`);
  }
}

export class InvalidConfigError extends QueueError {
  constructor(
    readonly key: string,
    message?: string,
  ) {
    super(message ?? `Invalid value for config "${key}".`);
  }
}

/** A job's own command failed. Routed to retry/DLQ, never surfaced to the CLI. */
export class ExecutionFailure extends QueueError {
  constructor(readonly result: ExecutionResult) {
    super(result.error ?? 'Execution failed');
  }
}

export class ValidationError extends QueueError {}
