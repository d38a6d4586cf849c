/**
 * Merge two records describing the same product. `primary` wins unless it lacks a value,
 * or the slot is allow-listed for `secondary` and the values differ. Every override is
 * recorded in the audit trail; filling an absent slot is not.
 */

import {
  SCALAR_FIELD_NAMES,
  type AuditEntry,
  type NormalizedRecord,
  type ScalarFieldName,
} from '@tessera/schemas';
import { isDeepStrictEqual } from 'node:util';

export const OVERRIDE_REASON = 'higher_confidence';

export interface MergeResult {
  merged: NormalizedRecord;
  auditEntries: AuditEntry[];
}

export function mergeRecords(
  primary: NormalizedRecord,
  secondary: NormalizedRecord,
  preferSecondary: Iterable<ScalarFieldName> = [],
): MergeResult {
  const prefer = new Set<string>(preferSecondary);
  const merged: NormalizedRecord = { ...primary };
  const auditEntries: AuditEntry[] = [];

  for (const name of SCALAR_FIELD_NAMES) {
    const entry = mergeScalar(merged, secondary, name, prefer.has(name));
    if (entry) auditEntries.push(entry);
  }
  merged.underlyings = pickList(primary.underlyings, secondary.underlyings);
  merged.couponSchedule = pickList(primary.couponSchedule, secondary.couponSchedule);
  merged.callObservationDates = pickList(
    primary.callObservationDates,
    secondary.callObservationDates,
  );
  merged.callSettlementDates = pickList(
    primary.callSettlementDates,
    secondary.callSettlementDates,
  );
  merged.sellingRestrictions = pickList(
    primary.sellingRestrictions,
    secondary.sellingRestrictions,
  );

  merged.id = primary.id;
  merged.auditTrail = [...primary.auditTrail, ...auditEntries];
  return { merged, auditEntries };
}

function mergeScalar<K extends ScalarFieldName>(
  target: NormalizedRecord,
  secondary: NormalizedRecord,
  name: K,
  preferSecondary: boolean,
): AuditEntry | null {
  const current = target[name];
  const incoming = secondary[name];
  if (incoming.value === null) return null;
  if (current.value === null) {
    target[name] = incoming;
    return null;
  }
  if (!preferSecondary || isDeepStrictEqual(current.value, incoming.value)) return null;
  target[name] = incoming;
  return { field: name, from: current.source, to: incoming.source, reason: OVERRIDE_REASON };
}

// Lists are taken wholesale, never merged element by element, and always copied.
function pickList<T>(primary: readonly T[], secondary: readonly T[]): T[] {
  return [...(primary.length === 0 && secondary.length > 0 ? secondary : primary)];
}
