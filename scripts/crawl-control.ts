/**
 * Inspect or steer crawl runs. A running crawl notices pause and cancel before its next request.
 *
 * Run: npm run crawl:control -- list
 *      npm run crawl:control -- status|pause|resume|cancel RUN_ID
 */
import './load-env';

import { createPgStores, getDb } from '@tessera/db';
import type { CrawlRun } from '@tessera/schemas';
import { CrawlRunRegistry } from '@tessera/crawler';
import { runScript } from './run-script';

function describeRun(run: CrawlRun): string {
  const progress = run.total > 0 ? `${run.completed}/${run.total}` : `${run.completed}`;
  const parts = [`${run.id}  ${run.status.padEnd(9)}  ${progress} done, ${run.errorsCount} errors`];
  parts.push(`  name: ${run.name}`);
  if (run.checkpointSegment !== null) {
    parts.push(`  checkpoint: segment '${run.checkpointSegment}' offset ${run.checkpointOffset}`);
  }
  if (run.lastError) parts.push(`  last error: ${run.lastError}`);
  return parts.join('\n');
}

runScript(async () => {
  const [command, runId] = process.argv.slice(2);
  const registry = new CrawlRunRegistry(createPgStores(getDb()).crawlRuns);

  if (command === 'list') {
    const runs = await registry.list();
    if (runs.length === 0) console.log('No crawl runs.');
    for (const run of runs) console.log(describeRun(run));
    return;
  }
  if (!runId) {
    throw new Error('Usage: crawl-control.ts list | status|pause|resume|cancel RUN_ID');
  }

  switch (command) {
    case 'status':
      console.log(describeRun(await registry.require(runId)));
      break;
    case 'pause':
      console.log(describeRun(await registry.pause(runId)));
      break;
    case 'resume':
      // Flips the status only; continue the work with `npm run crawl -- --resume RUN_ID`.
      console.log(describeRun(await registry.resume(runId)));
      break;
    case 'cancel':
      console.log(describeRun(await registry.cancel(runId)));
      break;
    default:
      throw new Error(`Unknown command: ${command}`);
  }
});
