/**
 * Ingest a single document (catalog JSON, quote page, term sheet text or a stored record) into
 * the product store, optionally merging a second document for the same product first.
 */

import {
  describeError,
  mergeRecords,
  parseDocument,
  sha256Hex,
  stampDocument,
  type ParseFailure,
  type SourceHint,
} from '@tessera/core';
import type { AuditEntry, ScalarFieldName } from '@tessera/schemas';
import type { ProductStore } from '@tessera/db';
import { crawlLog } from './logs';

const LOG = 'Ingest';

export interface IngestDocument {
  raw: string;
  sourceHint: SourceHint;
  isin?: string;
}

export interface IngestInput extends IngestDocument {
  fileName?: string | null;
  filePath?: string | null;
  /** A second document for the same product, merged under the first. */
  secondary?: IngestDocument & { preferSecondary?: ScalarFieldName[] };
}

export interface IngestResult {
  id: string | null;
  contentHash: string;
  issues: ParseFailure[];
  auditEntries: AuditEntry[];
}

/**
 * Parse, merge and upsert. Parse issues are returned rather than thrown; a document that yields
 * no ISIN and no product name is not stored and `id` is null.
 */
export async function ingestDocument(
  products: ProductStore,
  input: IngestInput,
): Promise<IngestResult> {
  const contentHash = sha256Hex(input.raw);
  const primary = parseDocument(input.raw, input.sourceHint, { isin: input.isin });
  const issues = [...primary.issues];
  let record = primary.record;
  let auditEntries: AuditEntry[] = [];

  if (input.secondary) {
    const secondary = parseDocument(input.secondary.raw, input.secondary.sourceHint, {
      isin: input.secondary.isin ?? record.isin.value ?? input.isin,
    });
    issues.push(...secondary.issues);
    const merged = mergeRecords(record, secondary.record, input.secondary.preferSecondary);
    record = merged.merged;
    auditEntries = merged.auditEntries;
  }

  const label = input.fileName ?? record.isin.value ?? contentHash.slice(0, 12);
  if (record.isin.value === null && record.productName.value === null) {
    crawlLog(LOG, `Nothing to store for ${label}`, {
      level: 'warn',
      detail: issues.map((issue) => issue.message).join('; ') || undefined,
    });
    return { id: null, contentHash, issues, auditEntries };
  }

  const stamped = stampDocument(record, {
    fileName: input.fileName ?? null,
    contentHash,
    sourceKind: input.sourceHint,
  });
  try {
    const id = await products.upsert({
      contentHash,
      record: stamped,
      sourceKind: input.sourceHint,
      rawText: input.raw,
      sourceFilePath: input.filePath ?? null,
    });
    crawlLog(LOG, `Stored ${label}`, {
      level: issues.length > 0 ? 'warn' : 'success',
      detail: issues.length > 0 ? `${issues.length} parse issues` : undefined,
    });
    return { id, contentHash, issues, auditEntries };
  } catch (err) {
    crawlLog(LOG, `Failed to store ${label}`, { level: 'error', detail: describeError(err) });
    throw err;
  }
}
