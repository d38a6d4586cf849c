import { z } from 'zod';
import { crawlRunStatusEnum } from './enums';

/** Narrowing applied to every catalog query of a crawl. */
export const crawlFiltersSchema = z.object({
  productTypes: z.array(z.string().min(1)).default([]),
  currencies: z.array(z.string().length(3)).default([]),
  /** Root segments to crawl instead of the default alphabet. */
  symbols: z.array(z.string().min(1)).default([]),
});
export type CrawlFilters = z.infer<typeof crawlFiltersSchema>;

/** Where a segmented crawl stopped. */
export const segmentPositionSchema = z.object({
  completedSegments: z.array(z.string()).default([]),
  segment: z.string().nullable().default(null),
  offset: z.number().int().nonnegative().default(0),
});
export type SegmentPosition = z.infer<typeof segmentPositionSchema>;

export const crawlRunSchema = z.object({
  id: z.string().uuid(),
  name: z.string(),
  status: crawlRunStatusEnum,
  total: z.number().int().nonnegative(),
  completed: z.number().int().nonnegative(),
  errorsCount: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
  checkpointOffset: z.number().int().nonnegative(),
  checkpointSegment: z.string().nullable(),
  completedSegments: z.array(z.string()),
  filters: crawlFiltersSchema.nullable(),
  startedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  endedAt: z.coerce.date().nullable(),
});
export type CrawlRun = z.infer<typeof crawlRunSchema>;

export const crawlRunInputSchema = z.object({
  name: z.string().min(1),
  filters: crawlFiltersSchema.optional(),
});
export type CrawlRunInput = z.infer<typeof crawlRunInputSchema>;
