/**
 * Quote-page enrichment source: fetches the public product page for an ISIN and reads the
 * key-facts table by row label. Pages are German or English; numbers use Swiss formatting.
 */

import { parse, type HTMLElement } from 'node-html-parser';
import type { NormalizedRecord, ScalarFieldName } from '@tessera/schemas';
import { makeField } from '../field';
import { createEmptyRecord, createEmptyUnderlying, hasContent } from '../record';
import {
  FetchError,
  FetchRateLimitedError,
  FetchTransientError,
  ParseFailure,
} from '../errors';
import { normalizeWhitespace, parseNumberCh, parseSwissDate, truncateExcerpt } from '../text';
import type { ParseOutcome } from '../parsing/types';
import { fetchWithTimeout } from './http';
import type { EnrichmentSource } from './types';

export const QUOTE_PAGE_SOURCE = 'quote_page';
const SERVICE_NAME = 'Quote page';

const ISIN_RE = /\b[A-Z]{2}[A-Z0-9]{9}[0-9]\b/;
const PERCENT_RE = /([0-9]+(?:[.,][0-9]+)?)\s*%/;

const LABELS = {
  issuer: ['Emittent', 'Issuer'],
  currency: ['Währung', 'Currency'],
  productType: ['Produkttyp', 'Typ', 'Type', 'Kategorie'],
  coupon: ['Kupon', 'Coupon', 'Zinssatz', 'Coupon p.a.', 'Verzinsung', 'Nominalzins', 'Zinsen'],
  barrier: ['Barriere', 'Barrier', 'Knock-In', 'Knock-In Barriere', 'Barriere-Level'],
  strike: ['Strike', 'Basispreis', 'Ausübungspreis', 'Strike Level'],
  cap: ['Cap', 'Höchstbetrag', 'Maximum', 'Cap Level'],
  participation: ['Partizipation', 'Partizipationsrate', 'Participation', 'Participation Rate'],
  maturity: ['Verfall', 'Fälligkeit', 'Laufzeitende', 'Maturity'],
  issueDate: ['Ausgabedatum', 'Emissionsdatum', 'Issue Date', 'Emission'],
} as const;

const NOT_FOUND_MARKERS = ['seite nicht gefunden', 'page not found', 'keine ergebnisse'];

function textOf(el: HTMLElement): string {
  return normalizeWhitespace(el.textContent ?? '');
}

/** Lower-cased row label → value of the second cell. The first row with a label wins. */
export function extractLabelTable(root: HTMLElement): Map<string, string> {
  const table = new Map<string, string>();
  for (const row of root.querySelectorAll('tr')) {
    const cells = row.querySelectorAll('td, th');
    if (cells.length < 2) continue;
    const label = textOf(cells[0]).replace(/:$/, '').toLowerCase();
    const value = textOf(cells[1]);
    if (label && value && !table.has(label)) table.set(label, value);
  }
  return table;
}

function lookup(table: Map<string, string>, labels: readonly string[]): string | null {
  for (const label of labels) {
    const value = table.get(label.toLowerCase());
    if (value) return value;
  }
  return null;
}

/** Parse a quote page. Never throws; `isin` is the one the page was requested for. */
export function parseQuotePage(html: string, isin: string): ParseOutcome {
  const s = QUOTE_PAGE_SOURCE;
  const root = parse(html, { comment: false });
  const table = extractLabelTable(root);
  const record = createEmptyRecord();

  const pageIsin = textOf(root).match(ISIN_RE)?.[0];
  const issues: ParseFailure[] = [];
  if (pageIsin) record.isin = makeField(pageIsin, 0.7, s, truncateExcerpt(pageIsin));
  else if (isin) record.isin = makeField(isin, 0.6, s, truncateExcerpt(isin));
  else issues.push(new ParseFailure(s, 'no ISIN on page'));

  const heading = root.querySelector('h1');
  if (heading) {
    const name = textOf(heading);
    if (name) record.productName = makeField(name, 0.6, s, truncateExcerpt(name));
  }

  const issuer = lookup(table, LABELS.issuer);
  if (issuer) record.issuerName = makeField(issuer, 0.6, s, truncateExcerpt(issuer));
  const currency = lookup(table, LABELS.currency);
  if (currency) record.currency = makeField(currency, 0.7, s, truncateExcerpt(currency));
  const productType = lookup(table, LABELS.productType);
  if (productType) {
    record.productType = makeField(productType, 0.6, s, truncateExcerpt(productType));
  }

  const couponText = lookup(table, LABELS.coupon);
  const couponMatch = couponText?.match(PERCENT_RE);
  const coupon = couponMatch ? parseNumberCh(couponMatch[1]) : null;
  if (couponText && coupon !== null) {
    record.couponRatePctPa = makeField(coupon, 0.8, s, truncateExcerpt(couponText));
  }

  const barrierText = lookup(table, LABELS.barrier);
  const barrier = parseNumberCh(barrierText);
  const strikeText = lookup(table, LABELS.strike);
  const strike = parseNumberCh(strikeText);
  if ((barrierText && barrier !== null) || (strikeText && strike !== null)) {
    const underlying = createEmptyUnderlying();
    if (barrierText && barrier !== null) {
      // Values up to 100 or written with % are relative to the initial level
      const field = makeField(barrier, 0.7, s, truncateExcerpt(barrierText));
      if (barrierText.includes('%') || barrier <= 100) underlying.barrierPctOfInitial = field;
      else underlying.barrierLevel = field;
    }
    if (strikeText && strike !== null) {
      underlying.strikeLevel = makeField(strike, 0.7, s, truncateExcerpt(strikeText));
    }
    record.underlyings = [underlying];
  }

  const capText = lookup(table, LABELS.cap);
  const cap = parseNumberCh(capText);
  if (capText && cap !== null) {
    record.capLevelPct = makeField(cap, 0.7, s, truncateExcerpt(capText));
  }

  const participationText = lookup(table, LABELS.participation);
  const participation = parseNumberCh(participationText);
  if (participationText && participation !== null) {
    record.participationRatePct = makeField(
      participation,
      0.7,
      s,
      truncateExcerpt(participationText),
    );
  }

  const maturityText = lookup(table, LABELS.maturity);
  const maturity = parseSwissDate(maturityText);
  if (maturityText && maturity) {
    record.maturityDate = makeField(maturity, 0.7, s, truncateExcerpt(maturityText));
  }
  const issueText = lookup(table, LABELS.issueDate);
  const issueDate = parseSwissDate(issueText);
  if (issueText && issueDate) {
    record.settlementDate = makeField(issueDate, 0.7, s, truncateExcerpt(issueText));
  }

  return { record, issues };
}

export function isNotFoundPage(html: string): boolean {
  const lower = html.toLowerCase();
  return NOT_FOUND_MARKERS.some((marker) => lower.includes(marker));
}

export interface QuotePageOptions {
  baseUrl: string;
  timeoutMs?: number;
}

export class QuotePageSource implements EnrichmentSource {
  readonly name = QUOTE_PAGE_SOURCE;
  readonly authoritativeFields: readonly ScalarFieldName[] = [
    'couponRatePctPa',
    'capLevelPct',
    'participationRatePct',
  ];
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: QuotePageOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 20000;
  }

  async fetchHtml(isin: string): Promise<string | null> {
    const url = `${this.baseUrl}/${encodeURIComponent(isin.toLowerCase())}`;
    return fetchWithTimeout(
      SERVICE_NAME,
      url,
      { headers: { Accept: 'text/html' } },
      this.timeoutMs,
      async (response) => {
        if (response.status === 404) return null;
        if (response.status === 429) throw new FetchRateLimitedError(SERVICE_NAME);
        if (response.status >= 500) {
          throw new FetchTransientError(SERVICE_NAME, response.statusText, response.status);
        }
        if (!response.ok) {
          throw new FetchError(SERVICE_NAME, response.status, response.statusText);
        }
        return response.text();
      },
    );
  }

  /** The parsed page, or null when the page is missing or carries nothing beyond the ISIN. */
  async lookup(isin: string): Promise<NormalizedRecord | null> {
    const html = await this.fetchHtml(isin);
    if (html === null || isNotFoundPage(html)) return null;
    const { record } = parseQuotePage(html, isin);
    return hasContent(record, ['isin']) ? record : null;
  }
}
