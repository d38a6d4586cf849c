import {
  pgTable,
  uuid,
  text,
  varchar,
  timestamp,
  jsonb,
  date,
  pgEnum,
  integer,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import type { CrawlFilters, NormalizedRecord } from '@tessera/schemas';

// Enums (storage)
export const crawlRunStatusEnum = pgEnum('crawl_run_status', [
  'running',
  'paused',
  'cancelled',
  'completed',
  'failed',
]);
export const reviewStatusEnum = pgEnum('review_status', ['not_reviewed', 'to_be_signed', 'signed']);

// One row per source document; content_hash identifies "same document from the same source".
export const products = pgTable(
  'products',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    contentHash: varchar('content_hash', { length: 64 }).notNull(),
    isin: varchar('isin', { length: 12 }),
    valorNumber: varchar('valor_number', { length: 32 }),
    issuerName: text('issuer_name'),
    productType: text('product_type'),
    currency: varchar('currency', { length: 3 }),
    maturityDate: date('maturity_date'),
    reviewStatus: reviewStatusEnum('review_status').notNull().default('not_reviewed'),
    sourceKind: varchar('source_kind', { length: 32 }).notNull(),
    normalized: jsonb('normalized').$type<NormalizedRecord>().notNull(),
    rawText: text('raw_text'),
    sourceFilePath: text('source_file_path'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    productsContentHashIdx: uniqueIndex('products_content_hash_idx').on(table.contentHash),
    productsIsinIdx: index('products_isin_idx').on(table.isin),
    productsCreatedIdx: index('products_created_idx').on(table.createdAt, table.id),
  }),
);

export const crawlRuns = pgTable(
  'crawl_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: text('name').notNull(),
    status: crawlRunStatusEnum('status').notNull().default('running'),
    total: integer('total').notNull().default(0),
    completed: integer('completed').notNull().default(0),
    errorsCount: integer('errors_count').notNull().default(0),
    lastError: text('last_error'),
    checkpointOffset: integer('checkpoint_offset').notNull().default(0),
    checkpointSegment: text('checkpoint_segment'),
    completedSegments: jsonb('completed_segments').$type<string[]>().notNull().default([]),
    filters: jsonb('filters').$type<CrawlFilters>(),
    startedAt: timestamp('started_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
    endedAt: timestamp('ended_at'),
  },
  (table) => ({
    crawlRunsStatusIdx: index('crawl_runs_status_idx').on(table.status),
  }),
);
