/**
 * Enrich stored products from the public quote pages, one resumable batch at a time.
 *
 * Run: npm run enrich -- [--batch-size N] [--filter missing_any] [--continuous] [--reset] [--stats]
 */
import './load-env';

import { parseArgs } from 'node:util';
import { QuotePageSource } from '@tessera/core';
import { createPgStores, getDb } from '@tessera/db';
import { enrichmentFilterEnum } from '@tessera/schemas';
import {
  FileCheckpointStore,
  loadConfig,
  runBatchCycle,
  runContinuously,
  type BatchDriverDeps,
} from '@tessera/crawler';
import { runScript } from './run-script';

runScript(async () => {
  const { values } = parseArgs({
    options: {
      'batch-size': { type: 'string' },
      filter: { type: 'string', default: 'missing_any' },
      continuous: { type: 'boolean', default: false },
      reset: { type: 'boolean', default: false },
      stats: { type: 'boolean', default: false },
    },
  });

  const config = loadConfig();
  const { products } = createPgStores(getDb(config.databaseUrl));
  const checkpoints = new FileCheckpointStore(config.enrich.stateFile);

  if (values.stats) {
    const stats = await products.enrichmentStats();
    const checkpoint = await checkpoints.load();
    console.log(`Products:            ${stats.total}`);
    console.log(`Missing coupon:      ${stats.missingCoupon}`);
    console.log(`Missing underlyings: ${stats.missingUnderlyings}`);
    console.log(`Missing barrier:     ${stats.missingBarrier}`);
    console.log(`Fully enriched:      ${stats.fullyEnriched}`);
    console.log(
      `Checkpoint: offset ${checkpoint.offset}, ${checkpoint.totalEnriched} enriched, ` +
        `${checkpoint.totalFailed} failed, last run ${checkpoint.lastRunTimestamp ?? 'never'}`,
    );
    return;
  }
  if (values.reset) {
    await checkpoints.reset();
    console.log('Checkpoint offset reset to 0.');
    return;
  }

  const filter = enrichmentFilterEnum.parse(values.filter);
  const batchSize = values['batch-size'] ? Number(values['batch-size']) : config.enrich.batchSize;
  if (!(Number.isInteger(batchSize) && batchSize > 0)) {
    throw new Error(`--batch-size must be a positive integer, got ${values['batch-size']}`);
  }

  const deps: BatchDriverDeps = {
    products,
    checkpoints,
    sources: [
      new QuotePageSource({ baseUrl: config.quotePage.baseUrl, timeoutMs: config.fetch.timeoutMs }),
    ],
    retry: {
      maxAttempts: config.fetch.maxRetries,
      delayMs: config.fetch.retryDelayMs,
      rateLimitDelayMs: config.fetch.rateLimitBackoffMs,
    },
  };
  const cycle = {
    batchSize,
    concurrency: config.enrich.concurrency,
    itemDelayMs: config.enrich.itemDelayMs,
    filter,
  };

  if (values.continuous) {
    let interrupted = false;
    process.once('SIGINT', () => {
      console.log('Stopping after the current cycle…');
      interrupted = true;
    });
    const result = await runContinuously(deps, {
      ...cycle,
      cycleDelayMs: config.enrich.cycleDelayMs,
      shouldStop: () => interrupted,
    });
    console.log(
      `Stopped (${result.stopReason}) after ${result.cycles} cycles: ` +
        `${result.succeeded} enriched, ${result.failed} failed.`,
    );
    if (result.stopReason === 'fatal') process.exitCode = 1;
    return;
  }

  const result = await runBatchCycle(deps, cycle);
  console.log(
    result.cycleComplete
      ? 'No candidates left; offset reset to 0.'
      : `${result.succeeded} enriched, ${result.failed} failed. Offset ${result.offsetBefore} → ${result.offsetAfter}.`,
  );
  for (const error of result.errors) console.log(`  ${error.item}: ${error.message}`);
  if (result.fatalError) process.exitCode = 1;
});
