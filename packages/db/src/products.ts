import { and, asc, count, desc, eq, isNotNull, sql, type SQL } from 'drizzle-orm';
import type { EnrichmentFilter, NormalizedRecord, ReviewStatus } from '@tessera/schemas';
import type { Db } from './client';
import { products } from './schema';

export type ProductRow = typeof products.$inferSelect;

export interface UpsertProductInput {
  contentHash: string;
  record: NormalizedRecord;
  sourceKind: string;
  rawText?: string | null;
  sourceFilePath?: string | null;
}

export interface ProductListFilters {
  isin?: string;
  issuerName?: string;
  productType?: string;
  currency?: string;
  reviewStatus?: ReviewStatus;
  limit?: number;
  offset?: number;
}

export interface EnrichmentCandidate {
  id: string;
  isin: string;
  record: NormalizedRecord;
}

export interface EnrichmentStats {
  total: number;
  missingCoupon: number;
  missingUnderlyings: number;
  missingBarrier: number;
  fullyEnriched: number;
}

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Columns mirrored out of the record so they can be filtered and indexed. */
export function indexedColumns(record: NormalizedRecord) {
  const maturity = record.maturityDate.value;
  return {
    isin: record.isin.value,
    valorNumber: record.valorNumber.value,
    issuerName: record.issuerName.value,
    productType: record.productType.value,
    currency: record.currency.value ? record.currency.value.slice(0, 3) : null,
    maturityDate: maturity && ISO_DATE_RE.test(maturity) ? maturity : null,
  };
}

/** The stored record with its row id filled in. */
export function hydrateRecord(row: Pick<ProductRow, 'id' | 'normalized'>): NormalizedRecord {
  return { ...row.normalized, id: row.id };
}

/**
 * Insert or update by content hash. Returns the row id, which stays the same across
 * re-ingestion. Review status is never touched here.
 */
export async function upsertProduct(db: Db, input: UpsertProductInput): Promise<string> {
  const now = new Date();
  const normalized: NormalizedRecord = { ...input.record, id: null };
  const base = {
    ...indexedColumns(input.record),
    sourceKind: input.sourceKind,
    normalized,
    rawText: input.rawText ?? null,
    updatedAt: now,
  };

  const [row] = await db
    .insert(products)
    .values({
      ...base,
      contentHash: input.contentHash,
      sourceFilePath: input.sourceFilePath ?? null,
    })
    .onConflictDoUpdate({
      target: products.contentHash,
      set: {
        ...base,
        sourceFilePath: sql`coalesce(excluded.source_file_path, ${products.sourceFilePath})`,
      },
    })
    .returning({ id: products.id });
  return row.id;
}

export async function getProduct(db: Db, id: string): Promise<ProductRow | null> {
  const [row] = await db.select().from(products).where(eq(products.id, id)).limit(1);
  return row ?? null;
}

function listConditions(filters: ProductListFilters): SQL | undefined {
  const conditions: SQL[] = [];
  if (filters.isin) conditions.push(eq(products.isin, filters.isin));
  if (filters.issuerName) conditions.push(eq(products.issuerName, filters.issuerName));
  if (filters.productType) conditions.push(eq(products.productType, filters.productType));
  if (filters.currency) conditions.push(eq(products.currency, filters.currency));
  if (filters.reviewStatus) conditions.push(eq(products.reviewStatus, filters.reviewStatus));
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export async function listProducts(
  db: Db,
  filters: ProductListFilters = {},
): Promise<ProductRow[]> {
  return db
    .select()
    .from(products)
    .where(listConditions(filters))
    .orderBy(desc(products.updatedAt))
    .limit(filters.limit ?? 50)
    .offset(filters.offset ?? 0);
}

export async function countProducts(db: Db, filters: ProductListFilters = {}): Promise<number> {
  const [row] = await db.select({ value: count() }).from(products).where(listConditions(filters));
  return row?.value ?? 0;
}

/** Replace the stored record after enrichment; index columns follow the record. */
export async function updateProductRecord(
  db: Db,
  id: string,
  record: NormalizedRecord,
): Promise<void> {
  await db
    .update(products)
    .set({ ...indexedColumns(record), normalized: { ...record, id: null }, updatedAt: new Date() })
    .where(eq(products.id, id));
}

export async function updateReviewStatus(
  db: Db,
  id: string,
  status: ReviewStatus,
): Promise<boolean> {
  const updated = await db
    .update(products)
    .set({ reviewStatus: status, updatedAt: new Date() })
    .where(eq(products.id, id))
    .returning({ id: products.id });
  return updated.length > 0;
}

export async function updateSourceFilePath(db: Db, id: string, path: string): Promise<boolean> {
  const updated = await db
    .update(products)
    .set({ sourceFilePath: path, updatedAt: new Date() })
    .where(eq(products.id, id))
    .returning({ id: products.id });
  return updated.length > 0;
}

// jsonb predicates over the stored record
const couponMissing = sql`(${products.normalized} -> 'couponRatePctPa' ->> 'value') IS NULL`;
const underlyingsEmpty = sql`jsonb_array_length(coalesce(${products.normalized} -> 'underlyings', '[]'::jsonb)) = 0`;
const barrierMissing = sql`((${products.normalized} -> 'underlyings' -> 0 -> 'barrierLevel' ->> 'value') IS NULL
  AND (${products.normalized} -> 'underlyings' -> 0 -> 'barrierPctOfInitial' ->> 'value') IS NULL)`;

export function enrichmentCondition(filter: EnrichmentFilter): SQL | undefined {
  switch (filter) {
    case 'missing_coupon':
      return couponMissing;
    case 'missing_barrier':
      return barrierMissing;
    case 'missing_any':
      return sql`(${couponMissing} OR ${underlyingsEmpty} OR ${barrierMissing})`;
    case 'all_with_isin':
      return undefined;
  }
}

/**
 * Page of products with an ISIN matching `filter`, in a stable order so that an offset
 * saved between invocations points at the same place.
 */
export async function listEnrichmentCandidates(
  db: Db,
  filter: EnrichmentFilter,
  limit: number,
  offset: number,
): Promise<EnrichmentCandidate[]> {
  const rows = await db
    .select({ id: products.id, isin: products.isin, normalized: products.normalized })
    .from(products)
    .where(and(isNotNull(products.isin), enrichmentCondition(filter)))
    .orderBy(asc(products.createdAt), asc(products.id))
    .limit(limit)
    .offset(offset);
  return rows.flatMap((r) => (r.isin ? [{ id: r.id, isin: r.isin, record: hydrateRecord(r) }] : []));
}

export async function getEnrichmentStats(db: Db): Promise<EnrichmentStats> {
  const [row] = await db
    .select({
      total: sql<number>`count(*)::int`,
      missingCoupon: sql<number>`count(*) filter (where ${couponMissing})::int`,
      missingUnderlyings: sql<number>`count(*) filter (where ${underlyingsEmpty})::int`,
      missingBarrier: sql<number>`count(*) filter (where ${products.productType} ilike '%barrier%' and ${barrierMissing})::int`,
      fullyEnriched: sql<number>`count(*) filter (where ${products.maturityDate} is not null and (not (${couponMissing}) or not (${underlyingsEmpty})))::int`,
    })
    .from(products)
    .where(isNotNull(products.isin));
  return (
    row ?? { total: 0, missingCoupon: 0, missingUnderlyings: 0, missingBarrier: 0, fullyEnriched: 0 }
  );
}
