import type { Server } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import type { JobRepo } from '../db/repo.js';
import { retryFromDLQ } from '../cli/retry.js';
import { InvalidStateError, NotFoundError } from '../core/errors.js';
import { errorMessage } from '../core/util.js';
import { isJobState, JOB_STATES, type Job } from '../core/types.js';

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const STYLE = `
  body { margin: 0; font-family: system-ui, sans-serif; background: #111114; color: #e6e6e6; }
  header { display: flex; justify-content: space-between; align-items: center; padding: 14px 24px; border-bottom: 1px solid #2b2b30; }
  header h1 { margin: 0; font-size: 1.4rem; color: #3d8bfd; }
  nav a { color: inherit; margin-left: 18px; text-decoration: none; }
  main { padding: 16px 28px; }
  h2 { margin-top: 32px; border-left: 4px solid #3d8bfd; padding-left: 8px; }
  table { width: 100%; border-collapse: collapse; background: #1b1b1f; }
  th, td { padding: 8px 10px; border-bottom: 1px solid #2b2b30; font-size: 0.9rem; text-align: left; }
  .stats { display: flex; justify-content: space-around; background: #1b1b1f; padding: 12px; border-radius: 6px; }
  .stat span { display: block; font-size: 1.3rem; text-align: center; }
  .pending span { color: #ff9800; } .processing span { color: #3d8bfd; } .completed span { color: #4caf50; }
  .failed span { color: #f44336; } .dead span { color: #8a8f98; }
  button { background: #3d8bfd; color: #fff; border: 0; padding: 5px 10px; border-radius: 4px; cursor: pointer; }
`;

function page(title: string, body: string) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <header>
    <h1>${escapeHtml(title)}</h1>
    <nav><a href="/jobs">Jobs</a><a href="/dlq">DLQ</a></nav>
  </header>
  <main>${body}</main>
  <script>
    async function retryJob(id) {
      const res = await fetch('/dlq/retry/' + encodeURIComponent(id), { method: 'POST' });
      if (!res.ok) { alert('Retry failed: ' + (await res.text())); return; }
      location.reload();
    }
  </script>
</body>
</html>`;
}

function jobRows(jobs: Job[], withRetry: boolean) {
  const head = `<tr><th>ID</th><th>Command</th><th>Attempts</th><th>Updated</th><th>Last error</th>${
    withRetry ? '<th></th>' : ''
  }</tr>`;
  const rows = jobs.map((j) => {
    const action = withRetry
      ? `<td><button data-id="${escapeHtml(j.id)}" onclick="retryJob(this.dataset.id)">Retry</button></td>`
      : '';
    return `<tr><td>${escapeHtml(j.id)}</td><td>${escapeHtml(j.command)}</td><td>${j.attempts}/${
      j.max_retries + 1
    }</td><td>${j.updated_at}</td><td>${escapeHtml((j.last_error ?? '').slice(0, 80))}</td>${action}</tr>`;
  });
  return `<table>${head}${rows.join('')}</table>`;
}

function statusFor(err: unknown): number {
  if (err instanceof NotFoundError) return 404;
  if (err instanceof InvalidStateError) return 409;
  return 500;
}

/**
 * Dashboard over the job store: jobs grouped by state, the DLQ with a retry
 * button, and a small JSON API.
 */
export function createDashboard(repo: JobRepo): Express {
  const app = express();

  app.get('/', (_req: Request, res: Response) => res.redirect('/jobs'));

  app.get('/jobs', (_req: Request, res: Response) => {
    const counts = repo.countByState();
    let body = `<div class="stats">${JOB_STATES.map(
      (s) => `<div class="stat ${s}">${s.toUpperCase()}<span>${counts[s]}</span></div>`,
    ).join('')}</div>`;

    for (const s of JOB_STATES) {
      const jobs = repo.listJobs(s);
      body += `<h2>${s.toUpperCase()} (${jobs.length})</h2>`;
      body += jobs.length === 0 ? '<p><i>No jobs</i></p>' : jobRows(jobs, false);
    }

    res.send(page('Queue Dashboard', body));
  });

  app.get('/dlq', (_req: Request, res: Response) => {
    const jobs = repo.listJobs('dead');
    const body = jobs.length === 0 ? '<p><i>No jobs in DLQ</i></p>' : jobRows(jobs, true);
    res.send(page('Dead Letter Queue', body));
  });

  app.post('/dlq/retry/:id', (req: Request, res: Response) => {
    try {
      const job = retryFromDLQ(repo, req.params.id);
      res.status(200).json(job);
    } catch (err) {
      res.status(statusFor(err)).send(errorMessage(err));
    }
  });

  app.get('/api/status', (_req: Request, res: Response) => {
    res.json({ counts: repo.countByState(), oldestPending: repo.oldestPending(), metrics: repo.metrics() });
  });

  app.get('/api/jobs', (req: Request, res: Response) => {
    const state = req.query.state;
    if (state === undefined) {
      res.json(repo.listJobs());
      return;
    }
    if (typeof state !== 'string' || !isJobState(state)) {
      res.status(400).send(`Unknown state, expected one of ${JOB_STATES.join('|')}`);
      return;
    }
    res.json(repo.listJobs(state));
  });

  return app;
}

/**
 * Listen on `port`. Rejects when the server cannot bind (e.g. EADDRINUSE)
 * instead of leaving the error unhandled.
 */
export function serveDashboard(repo: JobRepo, port: number): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = createDashboard(repo).listen(port);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}
