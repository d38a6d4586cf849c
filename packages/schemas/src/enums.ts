import { z } from 'zod';

export const crawlRunStatusEnum = z.enum(['running', 'paused', 'cancelled', 'completed', 'failed']);
export type CrawlRunStatus = z.infer<typeof crawlRunStatusEnum>;

export const reviewStatusEnum = z.enum(['not_reviewed', 'to_be_signed', 'signed']);
export type ReviewStatus = z.infer<typeof reviewStatusEnum>;

export const sourceKindEnum = z.enum([
  'catalog_api',
  'quote_page',
  'termsheet_text',
  'record_json',
  'unknown',
]);
export type SourceKind = z.infer<typeof sourceKindEnum>;

/** Which stored products an enrichment cycle picks up. */
export const enrichmentFilterEnum = z.enum([
  'missing_coupon',
  'missing_barrier',
  'missing_any',
  'all_with_isin',
]);
export type EnrichmentFilter = z.infer<typeof enrichmentFilterEnum>;
