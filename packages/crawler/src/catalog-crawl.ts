/**
 * Catalog crawl job: runs the segmented pager against the catalog API, parses each product and
 * upserts it by content hash, and keeps the crawl run's counters and checkpoint current.
 */

import {
  CATALOG_SOURCE,
  CatalogApiClient,
  contentHashFor,
  describeError,
  parseCatalogProduct,
  stampDocument,
  type CatalogApiProduct,
  type CatalogProvider,
} from '@tessera/core';
import {
  crawlFiltersSchema,
  type CrawlFilters,
  type CrawlRun,
  type CrawlRunStatus,
  type SegmentPosition,
} from '@tessera/schemas';
import type { ProductStore } from '@tessera/db';
import { requireCatalogAccess, type TesseraConfig } from './config';
import { crawlLog } from './logs';
import { emptyOutcome, recordItemFailure, recordItemSuccess, type ItemOutcome } from './outcome';
import type { CrawlRunRegistry } from './run-registry';
import { crawlSegmented, type PagerResult } from './segmented-pager';
import type { Sleep } from './sleep';

const LOG = 'CatalogCrawl';

export interface CatalogCrawlDeps {
  registry: CrawlRunRegistry;
  products: ProductStore;
  config: TesseraConfig;
  /** Defaults to the catalog API client built from config. */
  provider?: CatalogProvider<CatalogApiProduct>;
  sleep?: Sleep;
}

export interface CatalogCrawlOptions {
  name?: string;
  filters?: Partial<CrawlFilters>;
  /** Continue a paused (or interrupted) run from its checkpoint. */
  resumeRunId?: string;
  maxItems?: number;
}

export interface CatalogCrawlResult extends ItemOutcome {
  runId: string;
  status: CrawlRunStatus;
  pager: PagerResult | null;
}

async function startRun(
  deps: CatalogCrawlDeps,
  options: CatalogCrawlOptions,
): Promise<{ run: CrawlRun; resumeFrom?: SegmentPosition }> {
  if (!options.resumeRunId) {
    const filters = crawlFiltersSchema.parse(options.filters ?? {});
    const run = await deps.registry.create(options.name ?? 'catalog crawl', filters);
    return { run };
  }
  const existing = await deps.registry.require(options.resumeRunId);
  const run =
    existing.status === 'running' ? existing : await deps.registry.resume(options.resumeRunId);
  return {
    run,
    resumeFrom: {
      completedSegments: run.completedSegments,
      segment: run.checkpointSegment,
      offset: run.checkpointOffset,
    },
  };
}

/** Final status once the pager returns; a concurrent pause or cancel wins over completion. */
async function settle(registry: CrawlRunRegistry, runId: string): Promise<CrawlRunStatus> {
  const current = await registry.require(runId);
  if (current.status !== 'running') return current.status;
  try {
    return (await registry.complete(runId)).status;
  } catch (err) {
    crawlLog(LOG, `Run ${runId} changed state while finishing`, { detail: describeError(err) });
    return (await registry.require(runId)).status;
  }
}

export async function crawlCatalog(
  deps: CatalogCrawlDeps,
  options: CatalogCrawlOptions = {},
): Promise<CatalogCrawlResult> {
  const { registry, products, config } = deps;
  const { run, resumeFrom } = await startRun(deps, options);
  const outcome = emptyOutcome();
  const result = (status: CrawlRunStatus, pager: PagerResult | null): CatalogCrawlResult => ({
    ...outcome,
    runId: run.id,
    status,
    pager,
  });

  let provider = deps.provider;
  if (!provider) {
    try {
      const access = requireCatalogAccess(config);
      provider = new CatalogApiClient({ ...access, timeoutMs: config.fetch.timeoutMs });
    } catch (err) {
      const message = describeError(err);
      crawlLog(LOG, 'Cannot start catalog crawl', { level: 'error', detail: message });
      return result(await registry.tryFail(run.id, message), null);
    }
  }

  const filters = crawlFiltersSchema.parse(run.filters ?? {});
  crawlLog(LOG, resumeFrom ? `Resuming run ${run.id}` : `Starting run ${run.id}`, {
    detail: JSON.stringify(filters),
  });

  const handleItem = async (item: CatalogApiProduct): Promise<void> => {
    const { record, issues } = parseCatalogProduct(item);
    const isin = record.isin.value;
    if (issues.length > 0 || !isin) {
      const message = issues[0]?.message ?? 'product missing ISIN';
      recordItemFailure(outcome, 'unknown', message);
      await registry.recordError(run.id, message);
      return;
    }
    try {
      const contentHash = contentHashFor(CATALOG_SOURCE, isin);
      await products.upsert({
        contentHash,
        record: stampDocument(record, { fileName: null, contentHash, sourceKind: CATALOG_SOURCE }),
        sourceKind: CATALOG_SOURCE,
        rawText: JSON.stringify(item),
      });
      recordItemSuccess(outcome);
      await registry.recordSuccess(run.id);
    } catch (err) {
      const message = `${isin}: ${describeError(err)}`;
      recordItemFailure(outcome, isin, message);
      await registry.recordError(run.id, message);
    }
  };

  let pager: PagerResult;
  try {
    pager = await crawlSegmented({
      provider,
      filters,
      onItem: handleItem,
      pageSize: config.catalog.pageSize,
      resultWindow: config.catalog.resultWindow,
      rateLimitMs: config.catalog.rateLimitMs,
      maxDepth: config.catalog.maxSegmentDepth,
      maxItems: options.maxItems ?? config.catalog.maxItems,
      retry: {
        maxAttempts: config.fetch.maxRetries,
        delayMs: config.fetch.retryDelayMs,
        rateLimitDelayMs: config.fetch.rateLimitBackoffMs,
      },
      sleep: deps.sleep,
      resumeFrom,
      shouldStop: async () => (await registry.pollStop(run.id)) !== null,
      onTotal: async (total) => {
        if (!resumeFrom || total > run.total) await registry.setTotal(run.id, total);
      },
      onProgress: (position) => registry.saveCheckpoint(run.id, position),
    });
  } catch (err) {
    const message = describeError(err);
    crawlLog(LOG, `Run ${run.id} aborted`, { level: 'error', detail: message });
    return result(await registry.tryFail(run.id, message), null);
  }

  for (const segmentError of pager.errors) {
    await registry.recordError(run.id, `segment '${segmentError.segment}': ${segmentError.message}`);
  }
  await registry.saveCheckpoint(run.id, pager.position);

  const status = pager.stopped
    ? (await registry.require(run.id)).status
    : await settle(registry, run.id);
  crawlLog(LOG, `Run ${run.id} ${status}`, {
    level: status === 'completed' ? 'success' : 'info',
    detail: `${outcome.succeeded} saved, ${outcome.failed} failed, ${pager.errors.length} segment errors`,
  });
  return result(status, pager);
}
