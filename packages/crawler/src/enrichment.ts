/**
 * Enrich one stored product from an ordered list of secondary sources. The first source that
 * returns data wins; its record is merged into the stored one with the source's authoritative
 * fields allowed to override.
 */

import {
  describeError,
  isFatalError,
  mergeRecords,
  recordsEqual,
  type EnrichmentSource,
} from '@tessera/core';
import type { AuditEntry, NormalizedRecord } from '@tessera/schemas';
import type { EnrichmentCandidate, ProductStore } from '@tessera/db';
import { crawlLog } from './logs';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from './retry';

const LOG = 'Enricher';

export interface SourceAttemptError {
  source: string;
  message: string;
}

export interface EnrichmentResult {
  productId: string;
  isin: string;
  status: 'updated' | 'unchanged';
  source: string;
  auditEntries: AuditEntry[];
  attempts: SourceAttemptError[];
}

export class EnrichmentFailedError extends Error {
  constructor(
    public isin: string,
    public attempts: SourceAttemptError[],
  ) {
    super(
      attempts.length > 0
        ? `${isin}: ${attempts.map((a) => `${a.source}: ${a.message}`).join('; ')}`
        : `${isin}: no source had data`,
    );
    this.name = 'EnrichmentFailedError';
  }
}

/**
 * Throws EnrichmentFailedError when no source yields data, and rethrows fatal errors
 * (rejected credentials) so the caller can stop the run.
 */
export async function enrichCandidate(
  candidate: EnrichmentCandidate,
  sources: readonly EnrichmentSource[],
  products: ProductStore,
  retry: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<EnrichmentResult> {
  const attempts: SourceAttemptError[] = [];

  for (const source of sources) {
    let found: NormalizedRecord | null;
    try {
      found = await withRetry(() => source.lookup(candidate.isin), { ...retry, label: LOG });
    } catch (err) {
      if (isFatalError(err)) throw err;
      attempts.push({ source: source.name, message: describeError(err) });
      continue;
    }
    if (!found) continue;

    const { merged, auditEntries } = mergeRecords(
      candidate.record,
      found,
      source.authoritativeFields,
    );
    const changed = auditEntries.length > 0 || !recordsEqual(merged, candidate.record);
    if (changed) {
      await products.updateRecord(candidate.id, merged);
      crawlLog(LOG, `Enriched ${candidate.isin} from ${source.name}`, {
        level: 'success',
        detail: auditEntries.length > 0 ? `${auditEntries.length} overrides` : undefined,
      });
    }
    return {
      productId: candidate.id,
      isin: candidate.isin,
      status: changed ? 'updated' : 'unchanged',
      source: source.name,
      auditEntries,
      attempts,
    };
  }

  throw new EnrichmentFailedError(candidate.isin, attempts);
}
