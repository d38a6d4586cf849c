import { normalizedRecordSchema } from '@tessera/schemas';
import { createEmptyRecord } from '../record';
import { ParseFailure, describeError } from '../errors';
import { parseCatalogProduct } from '../connectors/catalog-parser';
import { parseQuotePage } from '../connectors/quote-page';
import { parseTermsheetText } from './termsheet-text';
import type { ParseOutcome } from './types';

export type { ParseOutcome } from './types';
export { parseTermsheetText, extractDates, TERMSHEET_SOURCE } from './termsheet-text';

export type SourceHint = 'catalog_api' | 'quote_page' | 'termsheet_text' | 'record_json';

export interface ParseOptions {
  /** ISIN the document was fetched for; used by page parsers when the page omits it. */
  isin?: string;
}

function failed(sourceHint: string, message: string): ParseOutcome {
  return { record: createEmptyRecord(), issues: [new ParseFailure(sourceHint, message)] };
}

type JsonResult = { ok: true; value: unknown } | { ok: false; outcome: ParseOutcome };

function parseJson(raw: string, sourceHint: string): JsonResult {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    return { ok: false, outcome: failed(sourceHint, `invalid JSON: ${describeError(err)}`) };
  }
}

/**
 * Dispatch a raw document to the parser for its source. Never throws: malformed input yields an
 * empty or partial record and at least one issue.
 */
export function parseDocument(
  raw: string,
  sourceHint: SourceHint,
  options: ParseOptions = {},
): ParseOutcome {
  switch (sourceHint) {
    case 'catalog_api': {
      const json = parseJson(raw, sourceHint);
      return json.ok ? parseCatalogProduct(json.value) : json.outcome;
    }
    case 'quote_page':
      return parseQuotePage(raw, options.isin ?? '');
    case 'termsheet_text':
      return parseTermsheetText(raw);
    case 'record_json': {
      const json = parseJson(raw, sourceHint);
      if (!json.ok) return json.outcome;
      const parsed = normalizedRecordSchema.safeParse(json.value);
      if (!parsed.success) {
        const first = parsed.error.issues[0];
        return failed(sourceHint, `${first.path.join('.') || 'record'}: ${first.message}`);
      }
      return { record: parsed.data, issues: [] };
    }
  }
}
