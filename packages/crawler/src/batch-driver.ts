/**
 * Resumable batch driver for enrichment. Each cycle reads the persisted offset, takes the next
 * batch of candidates, and runs them through the worker pool, saving the checkpoint after every
 * item. The offset counts items handed to a worker, so a restart never repeats a submitted item.
 */

import { describeError, isFatalError, type EnrichmentSource } from '@tessera/core';
import type { EnrichCheckpoint, EnrichmentFilter } from '@tessera/schemas';
import type { EnrichmentCandidate, ProductStore } from '@tessera/db';
import type { CheckpointStore } from './checkpoint';
import { enrichCandidate } from './enrichment';
import { crawlLog } from './logs';
import {
  ERROR_SAMPLE_SIZE,
  emptyOutcome,
  recordItemFailure,
  recordItemSuccess,
  type ItemOutcome,
} from './outcome';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';
import type { CrawlRunRegistry, StopReason } from './run-registry';
import { sleep as defaultSleep, type Sleep } from './sleep';
import { runWorkerPool } from './worker-pool';

const LOG = 'BatchDriver';

export interface BatchDriverDeps {
  products: ProductStore;
  checkpoints: CheckpointStore;
  sources: readonly EnrichmentSource[];
  /** With a run id, the driver polls the run between dispatches and records counts on it. */
  registry?: CrawlRunRegistry;
  runId?: string;
  retry?: RetryPolicy;
  sleep?: Sleep;
  now?: () => Date;
}

export interface BatchCycleOptions {
  batchSize: number;
  concurrency: number;
  itemDelayMs: number;
  filter: EnrichmentFilter;
}

export interface BatchCycleResult extends ItemOutcome {
  offsetBefore: number;
  offsetAfter: number;
  /** The candidate query came back empty and the offset went back to 0. */
  cycleComplete: boolean;
  stopReason: StopReason | null;
  /** Message of the error that stopped dispatch, if any. */
  fatalError: string | null;
  checkpoint: EnrichCheckpoint;
}

export async function runBatchCycle(
  deps: BatchDriverDeps,
  options: BatchCycleOptions,
): Promise<BatchCycleResult> {
  const { products, checkpoints, registry, runId } = deps;
  const now = deps.now ?? (() => new Date());
  const policy = deps.retry ?? DEFAULT_RETRY_POLICY;
  const retry = { ...policy, sleep: deps.sleep ?? policy.sleep };
  const outcome = emptyOutcome();

  let checkpoint = await checkpoints.load();
  const offsetBefore = checkpoint.offset;
  const candidates = await products.listEnrichmentCandidates(
    options.filter,
    options.batchSize,
    offsetBefore,
  );

  if (candidates.length === 0) {
    checkpoint = { ...checkpoint, offset: 0, lastRunTimestamp: now().toISOString() };
    await checkpoints.save(checkpoint);
    crawlLog(LOG, `No candidates at offset ${offsetBefore}; cycle complete, offset reset to 0`);
    return {
      ...outcome,
      offsetBefore,
      offsetAfter: 0,
      cycleComplete: true,
      stopReason: null,
      fatalError: null,
      checkpoint,
    };
  }

  crawlLog(LOG, `Processing ${candidates.length} candidates from offset ${offsetBefore}`, {
    detail: `filter ${options.filter}, ${options.concurrency} workers`,
  });

  let submitted = 0;
  let fatal: unknown = null;
  let stopReason: StopReason | null = null;

  const worker = async (candidate: EnrichmentCandidate): Promise<void> => {
    submitted++;
    await enrichCandidate(candidate, deps.sources, products, retry);
  };

  const summary = await runWorkerPool(candidates, worker, {
    concurrency: options.concurrency,
    itemDelayMs: options.itemDelayMs,
    sleep: deps.sleep ?? defaultSleep,
    shouldDispatch: async () => {
      if (fatal !== null || stopReason !== null) return false;
      if (!registry || !runId) return true;
      const polled = await registry.pollStop(runId);
      // A slower poll from another worker must not clear a stop already seen.
      if (polled !== null && stopReason === null) stopReason = polled;
      return polled === null;
    },
    onSettled: async (settled) => {
      if (settled.ok) {
        recordItemSuccess(outcome);
        checkpoint = { ...checkpoint, totalEnriched: checkpoint.totalEnriched + 1 };
      } else {
        const message = describeError(settled.error);
        if (isFatalError(settled.error) && fatal === null) fatal = settled.error;
        recordItemFailure(outcome, settled.item.isin, message);
        checkpoint = { ...checkpoint, totalFailed: checkpoint.totalFailed + 1 };
        crawlLog(LOG, `Failed ${settled.item.isin}`, { level: 'warn', detail: message });
      }
      checkpoint = {
        ...checkpoint,
        offset: offsetBefore + submitted,
        lastRunTimestamp: now().toISOString(),
      };
      await checkpoints.save(checkpoint);
      if (registry && runId) {
        if (settled.ok) await registry.recordSuccess(runId);
        else await registry.recordError(runId, describeError(settled.error));
      }
    },
  });

  checkpoint = {
    ...checkpoint,
    offset: offsetBefore + summary.dispatched,
    lastRunTimestamp: now().toISOString(),
  };
  await checkpoints.save(checkpoint);

  const fatalError = fatal === null ? null : describeError(fatal);
  if (fatalError) {
    crawlLog(LOG, 'Stopped on fatal error', { level: 'error', detail: fatalError });
    if (registry && runId) await registry.tryFail(runId, fatalError);
  }
  crawlLog(LOG, `Cycle done: ${outcome.succeeded} ok, ${outcome.failed} failed`, {
    level: outcome.failed > 0 ? 'warn' : 'success',
    detail: `offset ${offsetBefore} → ${checkpoint.offset}`,
  });

  return {
    ...outcome,
    offsetBefore,
    offsetAfter: checkpoint.offset,
    cycleComplete: false,
    stopReason,
    fatalError,
    checkpoint,
  };
}

export interface ContinuousOptions extends BatchCycleOptions {
  cycleDelayMs: number;
  /** Checked before each cycle. */
  shouldStop?: () => boolean | Promise<boolean>;
  maxCycles?: number;
}

export interface ContinuousResult extends ItemOutcome {
  cycles: number;
  stopReason: StopReason | 'requested' | 'fatal' | 'max_cycles';
}

/**
 * Run cycles until told to stop. Waits `cycleDelayMs` between cycles, twice that after a cycle
 * that found nothing to do.
 */
export async function runContinuously(
  deps: BatchDriverDeps,
  options: ContinuousOptions,
): Promise<ContinuousResult> {
  const sleep = deps.sleep ?? defaultSleep;
  const totals = emptyOutcome();
  let cycles = 0;

  for (;;) {
    if (options.shouldStop && (await options.shouldStop())) {
      return { ...totals, cycles, stopReason: 'requested' };
    }
    if (options.maxCycles !== undefined && cycles >= options.maxCycles) {
      return { ...totals, cycles, stopReason: 'max_cycles' };
    }

    const result = await runBatchCycle(deps, options);
    cycles++;
    totals.processed += result.processed;
    totals.succeeded += result.succeeded;
    totals.failed += result.failed;
    for (const error of result.errors) {
      if (totals.errors.length < ERROR_SAMPLE_SIZE) totals.errors.push(error);
    }

    if (result.fatalError) return { ...totals, cycles, stopReason: 'fatal' };
    if (result.stopReason) return { ...totals, cycles, stopReason: result.stopReason };

    const idle = result.processed === 0;
    if (idle) crawlLog(LOG, 'Nothing to enrich; waiting');
    await sleep(idle ? options.cycleDelayMs * 2 : options.cycleDelayMs);
  }
}
