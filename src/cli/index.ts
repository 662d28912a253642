#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { loadSettings } from '../config.js';
import { setLogLevel } from '../core/logger.js';
import { errorMessage } from '../core/util.js';
import { openDB } from '../db/db.js';
import { createRepo, type JobRepo } from '../db/repo.js';
import { serveDashboard } from '../web/server.js';
import { getConfigAll, getConfigValue, setConfigKV } from './config_cmd.js';
import { printDLQ } from './dlq.js';
import { enqueueFromArgs } from './enqueue.js';
import { printList } from './list.js';
import { retryFromDLQ } from './retry.js';
import { printStatus } from './status.js';
import { requestStop, startWorkers } from './worker_cmd.js';

const settings = loadSettings();
setLogLevel(settings.logLevel);

let repo: JobRepo | undefined;
function getRepo(): JobRepo {
  repo ??= createRepo(openDB(settings.dbPath));
  return repo;
}

function intArg(min: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return n;
  };
}

/** Run a command body; user-facing failures print and set a non-zero exit code. */
async function guarded(fn: () => void | Promise<void>) {
  try {
    await fn();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('queuectl')
  .description('CLI-based background job queue with retries, exponential backoff and a dead letter queue')
  .version('0.3.0');

program
  .command('enqueue')
  .description('Enqueue a job from JSON ({"id","command","max_retries"}) or from <id> <command>')
  .argument('<input>', 'Job JSON or ID')
  .argument('[command]', 'Command to execute (if not using JSON)')
  .option('--max-retries <n>', 'retries after the first failed attempt', intArg(0))
  .action((input: string, command: string | undefined, opts: { maxRetries?: number }) =>
    guarded(() => {
      const job = enqueueFromArgs(getRepo(), input, command, opts.maxRetries);
      console.log(`Enqueued job ${job.id} (${job.command}), max_retries=${job.max_retries}`);
    }),
  );

const worker = program.command('worker').description('Worker management');

worker
  .command('start')
  .description('Run workers in the foreground until stopped')
  .option('--count <n>', 'number of workers', intArg(1), 1)
  .option('--poll-interval <ms>', 'idle poll interval in milliseconds', intArg(1), settings.pollIntervalMs)
  .action((opts: { count: number; pollInterval: number }) =>
    guarded(async () => {
      console.log(`Starting ${opts.count} worker(s). Ctrl-C or 'queuectl worker stop' to stop.`);
      const handled = await startWorkers(getRepo(), settings.dbPath, {
        count: opts.count,
        pollIntervalMs: opts.pollInterval,
      });
      console.log(`Workers stopped after ${handled} job(s).`);
    }),
  );

worker
  .command('stop')
  .description('Ask running workers to exit after their current job')
  .action(() =>
    guarded(() => {
      requestStop(settings.dbPath);
      console.log('Stop requested. Workers will exit after finishing current jobs.');
    }),
  );

program
  .command('status')
  .description('Counts per state, metrics and worker status')
  .action(() => guarded(() => printStatus(getRepo(), settings.dbPath)));

program
  .command('list')
  .option('--state <state>', 'pending|processing|completed|failed|dead')
  .option('--json', 'one JSON object per line')
  .action((opts: { state?: string; json?: boolean }) =>
    guarded(() => printList(getRepo(), opts.state, opts.json ?? false)),
  );

const dlq = program.command('dlq').description('Dead letter queue');
dlq
  .command('list')
  .option('--json', 'one JSON object per line')
  .action((opts: { json?: boolean }) => guarded(() => printDLQ(getRepo(), opts.json ?? false)));
dlq
  .command('retry')
  .argument('<id>')
  .action((id: string) =>
    guarded(() => {
      retryFromDLQ(getRepo(), id);
      console.log('Re-enqueued job', id);
    }),
  );

const config = program.command('config').description('Runtime settings stored in the database');
config
  .command('get')
  .argument('[key]')
  .action((key: string | undefined) =>
    guarded(() => {
      if (!key) {
        console.log(getConfigAll(getRepo()));
        return;
      }
      const value = getConfigValue(getRepo(), key);
      if (value === undefined) throw new Error(`Unknown config key "${key}"`);
      console.log(value);
    }),
  );
config
  .command('set')
  .argument('<key>')
  .argument('<value>')
  .action((key: string, value: string) =>
    guarded(() => {
      setConfigKV(getRepo(), key, value);
      console.log(`Set config ${key} = ${value}`);
    }),
  );

program
  .command('dashboard')
  .description('Serve the web dashboard')
  .option('--port <n>', 'port to listen on', intArg(1), settings.dashboardPort)
  .action((opts: { port: number }) =>
    guarded(async () => {
      await serveDashboard(getRepo(), opts.port);
      console.log(`Queue dashboard running at http://localhost:${opts.port}`);
    }),
  );

await program.parseAsync(process.argv);
