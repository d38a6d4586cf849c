/**
 * Values derived from a parsed record rather than read from a document.
 */

import { SCALAR_FIELD_NAMES, type NormalizedRecord } from '@tessera/schemas';
import { makeField } from './field';

export const PARSE_VERSION = '0.1';
export const BASE_CURRENCY = 'CHF';

/** FX risk: the product is not in CHF or one of its underlyings is quoted in USD. */
export function deriveFxRisk(record: NormalizedRecord): boolean {
  const currency = record.currency.value;
  if (currency && currency !== BASE_CURRENCY) return true;
  return record.underlyings.some((u) => u.referenceCurrency.value === 'USD');
}

/** Mean confidence over the scalar slots that hold a value, two decimals. 0 for an empty record. */
export function meanConfidence(record: NormalizedRecord): number {
  const present = SCALAR_FIELD_NAMES.map((name) => record[name]).filter((f) => f.value !== null);
  if (present.length === 0) return 0;
  const sum = present.reduce((acc, f) => acc + f.confidence, 0);
  return Math.round((sum / present.length) * 100) / 100;
}

export interface DocumentStamp {
  fileName: string | null;
  contentHash: string;
  sourceKind: string;
}

/** Stamp document metadata and derived flags onto a freshly parsed record. */
export function stampDocument(record: NormalizedRecord, stamp: DocumentStamp): NormalizedRecord {
  const confidence = meanConfidence(record);
  return {
    ...record,
    sourceFileName: stamp.fileName
      ? makeField(stamp.fileName, 1, stamp.sourceKind)
      : record.sourceFileName,
    sourceFileHashSha256: makeField(stamp.contentHash, 1, stamp.sourceKind),
    parseVersion: makeField(PARSE_VERSION, 1, 'system'),
    parseConfidence: makeField(confidence, confidence, 'system'),
    fxRiskFlag: makeField(deriveFxRisk(record), 0.6, 'derived'),
  };
}
