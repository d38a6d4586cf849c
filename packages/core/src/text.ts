/**
 * Text helpers for parsers: whitespace cleanup, evidence excerpts, Swiss number and date formats.
 */

export const MAX_EXCERPT_LENGTH = 200;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncateExcerpt(text: string, maxLength = MAX_EXCERPT_LENGTH): string {
  const clean = normalizeWhitespace(text);
  if (clean.length <= maxLength) return clean;
  return `${clean.slice(0, maxLength - 3)}...`;
}

/**
 * Parse numbers written as `1'234.56`, `1’234,56`, `12.5%` or `CHF 1 000`.
 * A single comma with no dot is a decimal separator; alongside a dot it is a thousands separator.
 */
export function parseNumberCh(text: string | null | undefined): number | null {
  if (!text) return null;
  let cleaned = text.replace(/[’'`\s ]/g, '').replace(/%/g, '');
  cleaned = cleaned.replace(/^[A-Za-z]{3}(?=[-+\d.,])/, '');
  if (cleaned.includes(',') && cleaned.includes('.')) {
    cleaned = cleaned.replace(/,/g, '');
  } else if (cleaned.includes(',')) {
    cleaned = cleaned.replace(',', '.');
  }
  const match = cleaned.match(/^[-+]?\d+(?:\.\d+)?/);
  if (!match) return null;
  const n = Number.parseFloat(match[0]);
  return Number.isFinite(n) ? n : null;
}

/** `DD.MM.YYYY` (also `/` or `-` separated) to ISO `YYYY-MM-DD`; already-ISO input passes through. */
export function parseSwissDate(text: string | null | undefined): string | null {
  if (!text) return null;
  const s = text.trim();
  const iso = s.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) return `${iso[1]}-${iso[2]}-${iso[3]}`;
  const m = s.match(/(\d{1,2})[./-](\d{1,2})[./-](\d{4})/);
  if (!m) return null;
  const day = Number(m[1]);
  const month = Number(m[2]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return `${m[3]}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
