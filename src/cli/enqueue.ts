import { z } from 'zod';
import type { JobRepo } from '../db/repo.js';
import { parseConfigValue } from '../core/config_values.js';
import { ValidationError } from '../core/errors.js';
import type { Job, JobDescriptor } from '../core/types.js';

const descriptorSchema = z.object({
  id: z.string().trim().min(1, 'id must not be empty'),
  command: z.string().trim().min(1, 'command must not be empty'),
  max_retries: z.number().int().nonnegative().optional(),
});

export function parseDescriptor(input: unknown): JobDescriptor {
  const parsed = descriptorSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'job'}: ${i.message}`);
    throw new ValidationError(`Invalid job: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function parsePayload(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    throw new ValidationError('Invalid JSON for job payload.');
  }
}

/**
 * Enqueue a new job.
 * Accepts a JSON string or a descriptor object. Fields other than id,
 * command and max_retries are ignored; every job starts pending.
 */
export function enqueue(repo: JobRepo, input: string | JobDescriptor, now: Date = new Date()): Job {
  const payload = typeof input === 'string' ? parsePayload(input) : input;
  const descriptor = parseDescriptor(payload);
  const maxRetries =
    descriptor.max_retries ?? parseConfigValue('default_max_retries', repo.getConfig('default_max_retries'));

  return repo.enqueue(
    { id: descriptor.id, command: descriptor.command, max_retries: maxRetries },
    now.toISOString(),
  );
}

const looksLikeJson = (input: string) => input.startsWith('{') && input.endsWith('}');

/**
 * `enqueue <json|id> [command] [--max-retries <n>]`. In the JSON form a
 * --max-retries flag overrides the payload's max_retries.
 */
export function enqueueFromArgs(
  repo: JobRepo,
  input: string,
  command: string | undefined,
  maxRetries: number | undefined,
  now: Date = new Date(),
): Job {
  const trimmed = input.trim();
  if (!looksLikeJson(trimmed)) {
    return enqueue(repo, { id: input, command: command ?? '', max_retries: maxRetries }, now);
  }
  if (command !== undefined) {
    throw new ValidationError('A JSON job takes no separate command argument.');
  }
  const payload = parsePayload(trimmed);
  if (maxRetries === undefined || typeof payload !== 'object' || payload === null) {
    return enqueue(repo, parseDescriptor(payload), now);
  }
  return enqueue(repo, parseDescriptor({ ...payload, max_retries: maxRetries }), now);
}
