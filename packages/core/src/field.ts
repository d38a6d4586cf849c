/**
 * Field construction helpers. Fields are frozen; updating a slot means building a new Field.
 */

import { UNKNOWN_SOURCE, clampConfidence, normalizeSource, type Field } from '@tessera/schemas';

export { clampConfidence };

/**
 * Build a Field. Never fails: confidence outside [0, 1] is clamped and an empty source
 * becomes `unknown`.
 */
export function makeField<T>(
  value: T | null = null,
  confidence = 0,
  source: string = UNKNOWN_SOURCE,
  evidence: string | null = null,
): Field<T> {
  return Object.freeze({
    value: value ?? null,
    confidence: clampConfidence(confidence),
    source: normalizeSource(source),
    evidence,
  });
}

export function isPresent<T>(field: Field<T>): field is Field<T> & { value: T } {
  return field.value !== null;
}
