// Claims jobs until none are left and prints one claimed id per line.
// Usage: claim_worker <dbPath> <workerId> [startAtMs]
import { sleep } from '../core/util.js';
import { openDB } from '../db/db.js';
import { createRepo } from '../db/repo.js';

const [dbPath, workerId, startAt] = process.argv.slice(2);
if (!dbPath || !workerId) {
  throw new Error('usage: claim_worker <dbPath> <workerId> [startAtMs]');
}

const repo = createRepo(openDB(dbPath));
// line every process up on the same instant so the claims overlap
await sleep(Math.max(0, Number(startAt ?? 0) - Date.now()));

const ids: string[] = [];
for (;;) {
  const job = repo.claimJob(new Date().toISOString(), workerId);
  if (!job) break;
  ids.push(job.id);
}
repo.close();
process.stdout.write(ids.join('\n'));
