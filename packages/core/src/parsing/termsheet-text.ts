/**
 * Pattern-based parser for term-sheet text already extracted from a PDF. Picks up identifiers,
 * currency, yields and call observation dates; anything it cannot find stays absent.
 */

import { makeField } from '../field';
import { createEmptyRecord } from '../record';
import { ParseFailure } from '../errors';
import { parseSwissDate, truncateExcerpt } from '../text';
import type { ParseOutcome } from './types';

export const TERMSHEET_SOURCE = 'termsheet_text';

const ISIN_RE = /\b[A-Z]{2}[A-Z0-9]{9}[0-9]\b/;
const VALOR_RE = /\b\d{6,9}\b/;
const CURRENCY_RE = /\b(CHF|EUR|USD|GBP|JPY)\b/;
const YTM_RE =
  /(Yield to Maturity|YTM|Rendite bis (?:F[aä]lligkeit|Verfall))[^0-9%]{0,30}([0-9]+(?:[.,][0-9]+)?)\s*%/i;
const WTY_RE =
  /(Yield to Worst|Worst to Yield|Worst-Case Rendite)[^0-9%]{0,30}([0-9]+(?:[.,][0-9]+)?)\s*%/i;
const OBSERVATION_RE =
  /(Early Redemption|Vorzeitige R[uü]ckzahlung|Autocall|Observation|Beobachtung)[^:\n]{0,100}[:\n]([\s\S]*?)(?=\n\n|$)/i;
const DATE_RE = /\b(\d{4}-\d{2}-\d{2}|\d{1,2}[./-]\d{1,2}[./-]\d{4})\b/g;

function percent(text: string): number {
  return Number.parseFloat(text.replace(',', '.'));
}

/** Distinct ISO dates in order of appearance. */
export function extractDates(text: string): string[] {
  const dates: string[] = [];
  for (const match of text.matchAll(DATE_RE)) {
    const iso = parseSwissDate(match[1]);
    if (iso && !dates.includes(iso)) dates.push(iso);
  }
  return dates;
}

export function parseTermsheetText(rawText: string): ParseOutcome {
  const s = TERMSHEET_SOURCE;
  const record = createEmptyRecord();
  if (!rawText.trim()) {
    return { record, issues: [new ParseFailure(s, 'document has no text')] };
  }

  const isin = rawText.match(ISIN_RE);
  if (isin) record.isin = makeField(isin[0], 0.7, s, truncateExcerpt(isin[0]));
  const valor = rawText.match(VALOR_RE);
  if (valor) record.valorNumber = makeField(valor[0], 0.4, s, truncateExcerpt(valor[0]));
  const currency = rawText.match(CURRENCY_RE);
  if (currency) record.currency = makeField(currency[1], 0.5, s, truncateExcerpt(currency[0]));

  const ytm = rawText.match(YTM_RE);
  if (ytm) {
    record.yieldToMaturityPctPa = makeField(percent(ytm[2]), 0.6, s, truncateExcerpt(ytm[0]));
  }
  const wty = rawText.match(WTY_RE);
  if (wty) {
    record.worstToYieldPctPa = makeField(percent(wty[2]), 0.6, s, truncateExcerpt(wty[0]));
  }

  const observation = rawText.match(OBSERVATION_RE);
  if (observation) {
    const section = observation[2];
    const excerpt = truncateExcerpt(section.slice(0, 100));
    record.callObservationDates = extractDates(section).map((d) => makeField(d, 0.7, s, excerpt));
  }

  const issues = isin ? [] : [new ParseFailure(s, 'no ISIN found')];
  return { record, issues };
}
