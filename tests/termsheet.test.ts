import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import path from 'path';
import { extractDates, parseDocument, parseTermsheetText } from '@tessera/core';

const text = readFileSync(path.resolve(__dirname, 'fixtures/termsheet.txt'), 'utf-8');

describe('parseTermsheetText', () => {
  it('picks up identifiers, currency and yield', () => {
    const { record, issues } = parseTermsheetText(text);
    expect(issues).toEqual([]);
    expect(record.isin.value).toBe('CH1234567890');
    expect(record.valorNumber.value).toBe('123456789');
    expect(record.currency.value).toBe('CHF');
    expect(record.yieldToMaturityPctPa).toEqual({
      value: 4.25,
      confidence: 0.6,
      source: 'termsheet_text',
      evidence: 'Yield to Maturity: 4,25 %',
    });
    expect(record.worstToYieldPctPa.value).toBeNull();
  });

  it('collects call observation dates from their section', () => {
    const { record } = parseTermsheetText(text);
    expect(record.callObservationDates.map((d) => d.value)).toEqual([
      '2025-06-15',
      '2025-12-15',
      '2026-06-15',
    ]);
  });

  it('reports empty documents and missing ISINs', () => {
    expect(parseTermsheetText('   ').issues.map((i) => i.message)).toEqual([
      'termsheet_text: document has no text',
    ]);
    expect(parseTermsheetText('Currency: EUR').issues.map((i) => i.message)).toEqual([
      'termsheet_text: no ISIN found',
    ]);
  });
});

describe('extractDates', () => {
  it('returns distinct ISO dates in order of appearance', () => {
    expect(extractDates('01.02.2026, 2026-02-01 and 5/3/2026')).toEqual([
      '2026-02-01',
      '2026-03-05',
    ]);
  });
});

describe('parseDocument', () => {
  it('dispatches catalog JSON to the catalog parser', () => {
    const raw = JSON.stringify({ identifiers: { isin: 'CH0000000001' }, currency: 'EUR' });
    const { record, issues } = parseDocument(raw, 'catalog_api');
    expect(issues).toEqual([]);
    expect(record.currency.value).toBe('EUR');
  });

  it('reports invalid JSON instead of throwing', () => {
    const { record, issues } = parseDocument('{not json', 'record_json');
    expect(record.isin.value).toBeNull();
    expect(issues).toHaveLength(1);
    expect(issues[0].message.startsWith('record_json: invalid JSON')).toBe(true);
  });

  it('validates stored records', () => {
    const ok = parseDocument(
      JSON.stringify({ isin: { value: 'CH0000000001', confidence: 0.9, source: 'x' } }),
      'record_json',
    );
    expect(ok.issues).toEqual([]);
    expect(ok.record.isin.value).toBe('CH0000000001');

    const wrongType = parseDocument(JSON.stringify({ isin: { value: 42 } }), 'record_json');
    expect(wrongType.issues.map((i) => i.message)).toEqual([
      'record_json: isin.value: Expected string, received number',
    ]);
  });

  it('keeps every slot of a stored record when one confidence is out of range', () => {
    const { record, issues } = parseDocument(
      JSON.stringify({
        isin: { value: 'CH0012345678', confidence: 1.2, source: 'catalog_api' },
        currency: { value: 'CHF', confidence: 0.9, source: 'catalog_api' },
      }),
      'record_json',
    );
    expect(issues).toEqual([]);
    expect(record.isin.value).toBe('CH0012345678');
    expect(record.isin.confidence).toBe(1);
    expect(record.currency.value).toBe('CHF');
  });

  it('passes the requested ISIN to the quote page parser', () => {
    const { record } = parseDocument('<h1>Tracker</h1>', 'quote_page', { isin: 'CH2222222222' });
    expect(record.isin.value).toBe('CH2222222222');
  });
});
