/**
 * @tessera/crawler - crawl and enrichment jobs, run registry, pager and batch driver
 */

export {
  crawlLog,
  getCrawlLogs,
  clearCrawlLogs,
  onCrawlLog,
  formatLogEntry,
  type CrawlLogEntry,
  type CrawlLogListener,
  type LogLevel,
} from './logs';
export { sleep, type Sleep } from './sleep';
export { loadConfig, requireCatalogAccess, type TesseraConfig } from './config';
export { DEFAULT_RETRY_POLICY, retryDelayFor, withRetry, type RetryPolicy } from './retry';
export {
  runWorkerPool,
  type WorkerPoolOptions,
  type WorkerPoolSummary,
  type WorkerResult,
} from './worker-pool';
export {
  ERROR_SAMPLE_SIZE,
  emptyOutcome,
  recordItemFailure,
  recordItemSuccess,
  type ItemError,
  type ItemOutcome,
} from './outcome';
export { CrawlRunRegistry, type StopReason } from './run-registry';
export {
  SegmentedPager,
  crawlSegmented,
  DEFAULT_ALPHABET,
  DEFAULT_RESULT_WINDOW,
  type PagerOptions,
  type PagerResult,
  type SegmentError,
} from './segmented-pager';
export {
  crawlCatalog,
  type CatalogCrawlDeps,
  type CatalogCrawlOptions,
  type CatalogCrawlResult,
} from './catalog-crawl';
export {
  FileCheckpointStore,
  MemoryCheckpointStore,
  initialCheckpoint,
  type CheckpointStore,
} from './checkpoint';
export {
  EnrichmentFailedError,
  enrichCandidate,
  type EnrichmentResult,
  type SourceAttemptError,
} from './enrichment';
export {
  runBatchCycle,
  runContinuously,
  type BatchCycleOptions,
  type BatchCycleResult,
  type BatchDriverDeps,
  type ContinuousOptions,
  type ContinuousResult,
} from './batch-driver';
export { ingestDocument, type IngestDocument, type IngestInput, type IngestResult } from './ingest';
