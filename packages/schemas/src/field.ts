import { z } from 'zod';

/**
 * A single attribute value with its provenance. `value: null` means the attribute is absent,
 * whatever the confidence says.
 */
export type Field<T> = Readonly<{
  value: T | null;
  confidence: number;
  source: string;
  evidence: string | null;
}>;

export const UNKNOWN_SOURCE = 'unknown';

export function clampConfidence(confidence: number): number {
  if (Number.isNaN(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}

export function normalizeSource(source: string): string {
  return source.trim() || UNKNOWN_SOURCE;
}

export function emptyField(): Field<never> {
  return Object.freeze({ value: null, confidence: 0, source: UNKNOWN_SOURCE, evidence: null });
}

/**
 * Schema for a Field carrying `value`; a missing slot parses to an empty Field. Stored
 * confidence and source get the same clamping as freshly built Fields.
 */
export function fieldOf<T extends z.ZodTypeAny>(value: T) {
  return z
    .object({
      value: value.nullable().default(null),
      confidence: z.number().default(0).transform(clampConfidence),
      source: z.string().default(UNKNOWN_SOURCE).transform(normalizeSource),
      evidence: z.string().nullable().default(null),
    })
    .readonly()
    .default(emptyField);
}

export const stringField = () => fieldOf(z.string());
export const numberField = () => fieldOf(z.number());
export const booleanField = () => fieldOf(z.boolean());
/** Named yes/no flags, e.g. risk disclosures. */
export const flagsField = () => fieldOf(z.record(z.boolean()));
/** Named percentages, e.g. the tax split of a coupon. */
export const ratesField = () => fieldOf(z.record(z.number()));
/** Named free-text rules, e.g. redemption or delivery terms. */
export const textsField = () => fieldOf(z.record(z.string()));
