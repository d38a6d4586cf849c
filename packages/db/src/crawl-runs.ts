import { and, desc, eq, inArray, sql } from 'drizzle-orm';
import type { CrawlFilters, CrawlRunStatus, SegmentPosition } from '@tessera/schemas';
import { isTerminal } from '@tessera/core';
import type { Db } from './client';
import { crawlRuns } from './schema';

export type CrawlRunRow = typeof crawlRuns.$inferSelect;

export interface CreateCrawlRunInput {
  name: string;
  filters?: CrawlFilters | null;
}

export async function createCrawlRun(db: Db, input: CreateCrawlRunInput): Promise<CrawlRunRow> {
  const [run] = await db
    .insert(crawlRuns)
    .values({ name: input.name, filters: input.filters ?? null, status: 'running' })
    .returning();
  return run;
}

export async function getCrawlRun(db: Db, id: string): Promise<CrawlRunRow | null> {
  const [run] = await db.select().from(crawlRuns).where(eq(crawlRuns.id, id)).limit(1);
  return run ?? null;
}

export async function listCrawlRuns(db: Db, limit = 50): Promise<CrawlRunRow[]> {
  return db.select().from(crawlRuns).orderBy(desc(crawlRuns.startedAt)).limit(limit);
}

/**
 * Move a run to `to` only if its current status is one of `from`. Returns the updated row, or
 * null when the run is missing or was in another state. `ended_at` is stamped on terminal states.
 */
export async function transitionCrawlRun(
  db: Db,
  id: string,
  to: CrawlRunStatus,
  from: readonly CrawlRunStatus[],
  lastError?: string | null,
): Promise<CrawlRunRow | null> {
  if (from.length === 0) return null;
  const now = new Date();
  const [updated] = await db
    .update(crawlRuns)
    .set({
      status: to,
      updatedAt: now,
      ...(isTerminal(to) ? { endedAt: now } : {}),
      ...(lastError !== undefined ? { lastError } : {}),
    })
    .where(and(eq(crawlRuns.id, id), inArray(crawlRuns.status, [...from])))
    .returning();
  return updated ?? null;
}

export async function setCrawlRunTotal(db: Db, id: string, total: number): Promise<void> {
  await db
    .update(crawlRuns)
    .set({ total, updatedAt: new Date() })
    .where(eq(crawlRuns.id, id));
}

/** Atomic counter increments; safe to call from concurrent workers. */
export async function incrementCrawlRun(
  db: Db,
  id: string,
  counts: { completed?: number; errors?: number },
  lastError?: string,
): Promise<void> {
  const completed = counts.completed ?? 0;
  const errors = counts.errors ?? 0;
  if (completed === 0 && errors === 0) return;
  await db
    .update(crawlRuns)
    .set({
      completed: sql`${crawlRuns.completed} + ${completed}`,
      errorsCount: sql`${crawlRuns.errorsCount} + ${errors}`,
      updatedAt: new Date(),
      ...(lastError !== undefined ? { lastError } : {}),
    })
    .where(eq(crawlRuns.id, id));
}

export async function saveCrawlRunCheckpoint(
  db: Db,
  id: string,
  position: SegmentPosition,
): Promise<void> {
  await db
    .update(crawlRuns)
    .set({
      checkpointOffset: position.offset,
      checkpointSegment: position.segment,
      completedSegments: position.completedSegments,
      updatedAt: new Date(),
    })
    .where(eq(crawlRuns.id, id));
}
