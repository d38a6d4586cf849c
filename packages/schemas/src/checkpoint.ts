import { z } from 'zod';

/** Progress of the enrichment driver, kept on disk between invocations. */
export const enrichCheckpointSchema = z.object({
  offset: z.number().int().nonnegative().default(0),
  totalEnriched: z.number().int().nonnegative().default(0),
  totalFailed: z.number().int().nonnegative().default(0),
  lastRunTimestamp: z.string().nullable().default(null),
});
export type EnrichCheckpoint = z.infer<typeof enrichCheckpointSchema>;
