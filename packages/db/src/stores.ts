/**
 * Storage seams used by the crawler. The PostgreSQL implementations delegate to the query
 * functions in this package; tests substitute in-memory versions.
 */

import type {
  CrawlRun,
  CrawlRunStatus,
  EnrichmentFilter,
  NormalizedRecord,
  ReviewStatus,
  SegmentPosition,
} from '@tessera/schemas';
import type { Db } from './client';
import {
  countProducts,
  getEnrichmentStats,
  getProduct,
  listEnrichmentCandidates,
  listProducts,
  updateProductRecord,
  updateReviewStatus,
  updateSourceFilePath,
  upsertProduct,
  type EnrichmentCandidate,
  type EnrichmentStats,
  type ProductListFilters,
  type ProductRow,
  type UpsertProductInput,
} from './products';
import {
  createCrawlRun,
  getCrawlRun,
  incrementCrawlRun,
  listCrawlRuns,
  saveCrawlRunCheckpoint,
  setCrawlRunTotal,
  transitionCrawlRun,
  type CreateCrawlRunInput,
} from './crawl-runs';

export interface ProductStore {
  upsert(input: UpsertProductInput): Promise<string>;
  get(id: string): Promise<ProductRow | null>;
  list(filters?: ProductListFilters): Promise<ProductRow[]>;
  count(filters?: ProductListFilters): Promise<number>;
  updateRecord(id: string, record: NormalizedRecord): Promise<void>;
  updateReviewStatus(id: string, status: ReviewStatus): Promise<boolean>;
  updateSourceFilePath(id: string, path: string): Promise<boolean>;
  listEnrichmentCandidates(
    filter: EnrichmentFilter,
    limit: number,
    offset: number,
  ): Promise<EnrichmentCandidate[]>;
  enrichmentStats(): Promise<EnrichmentStats>;
}

export interface CrawlRunStore {
  create(input: CreateCrawlRunInput): Promise<CrawlRun>;
  get(id: string): Promise<CrawlRun | null>;
  list(limit?: number): Promise<CrawlRun[]>;
  /** Conditional status change; null when the run is missing or not in one of `from`. */
  transition(
    id: string,
    to: CrawlRunStatus,
    from: readonly CrawlRunStatus[],
    lastError?: string | null,
  ): Promise<CrawlRun | null>;
  setTotal(id: string, total: number): Promise<void>;
  increment(
    id: string,
    counts: { completed?: number; errors?: number },
    lastError?: string,
  ): Promise<void>;
  saveCheckpoint(id: string, position: SegmentPosition): Promise<void>;
}

export interface Stores {
  products: ProductStore;
  crawlRuns: CrawlRunStore;
}

export function createPgStores(db: Db): Stores {
  return {
    products: {
      upsert: (input) => upsertProduct(db, input),
      get: (id) => getProduct(db, id),
      list: (filters) => listProducts(db, filters),
      count: (filters) => countProducts(db, filters),
      updateRecord: (id, record) => updateProductRecord(db, id, record),
      updateReviewStatus: (id, status) => updateReviewStatus(db, id, status),
      updateSourceFilePath: (id, path) => updateSourceFilePath(db, id, path),
      listEnrichmentCandidates: (filter, limit, offset) =>
        listEnrichmentCandidates(db, filter, limit, offset),
      enrichmentStats: () => getEnrichmentStats(db),
    },
    crawlRuns: {
      create: (input) => createCrawlRun(db, input),
      get: (id) => getCrawlRun(db, id),
      list: (limit) => listCrawlRuns(db, limit),
      transition: (id, to, from, lastError) => transitionCrawlRun(db, id, to, from, lastError),
      setTotal: (id, total) => setCrawlRunTotal(db, id, total),
      increment: (id, counts, lastError) => incrementCrawlRun(db, id, counts, lastError),
      saveCheckpoint: (id, position) => saveCrawlRunCheckpoint(db, id, position),
    },
  };
}
