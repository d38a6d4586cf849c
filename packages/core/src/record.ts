import { isDeepStrictEqual } from 'node:util';
import {
  LIST_FIELD_NAMES,
  SCALAR_FIELD_NAMES,
  normalizedRecordSchema,
  underlyingSchema,
  type Field,
  type NormalizedRecord,
  type ScalarFieldName,
  type Underlying,
} from '@tessera/schemas';

/** A record with every scalar slot absent and every list empty. */
export function createEmptyRecord(): NormalizedRecord {
  return normalizedRecordSchema.parse({});
}

/** Validate a serialised record; slots it leaves out come back empty. */
export function recordFromJson(input: unknown): NormalizedRecord {
  return normalizedRecordSchema.parse(input);
}

/** Copy of `record` with one slot replaced. */
export function withField<K extends ScalarFieldName>(
  record: NormalizedRecord,
  name: K,
  field: NormalizedRecord[K],
): NormalizedRecord {
  const next = { ...record };
  next[name] = field;
  return next;
}

/** Structural equality over everything except `id` and `auditTrail`. */
export function recordsEqual(a: NormalizedRecord, b: NormalizedRecord): boolean {
  const { id: _aId, auditTrail: _aTrail, ...aRest } = a;
  const { id: _bId, auditTrail: _bTrail, ...bRest } = b;
  return isDeepStrictEqual(aRest, bRest);
}

export function fieldValuesEqual<T>(a: Field<T>, b: Field<T>): boolean {
  return isDeepStrictEqual(a.value, b.value);
}

export function createEmptyUnderlying(): Underlying {
  return underlyingSchema.parse({});
}

/** True when any scalar slot other than those in `ignore` holds a value, or any list is non-empty. */
export function hasContent(
  record: NormalizedRecord,
  ignore: readonly ScalarFieldName[] = [],
): boolean {
  const skip = new Set<string>(ignore);
  const scalar = SCALAR_FIELD_NAMES.some((name) => !skip.has(name) && record[name].value !== null);
  return scalar || LIST_FIELD_NAMES.some((name) => record[name].length > 0);
}
