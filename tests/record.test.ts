import { describe, it, expect } from 'vitest';
import {
  createEmptyRecord,
  createEmptyUnderlying,
  hasContent,
  makeField,
  recordFromJson,
  recordsEqual,
  withField,
} from '@tessera/core';
import { LIST_FIELD_NAMES, SCALAR_FIELD_NAMES } from '@tessera/schemas';

describe('createEmptyRecord', () => {
  it('has every scalar slot absent and every list empty', () => {
    const record = createEmptyRecord();
    expect(SCALAR_FIELD_NAMES.every((name) => record[name].value === null)).toBe(true);
    expect(LIST_FIELD_NAMES.every((name) => record[name].length === 0)).toBe(true);
    expect(record.id).toBeNull();
    expect(record.auditTrail).toEqual([]);
    expect(hasContent(record)).toBe(false);
  });

  it('returns independent lists', () => {
    const a = createEmptyRecord();
    const b = createEmptyRecord();
    a.underlyings.push(createEmptyUnderlying());
    expect(b.underlyings).toEqual([]);
  });
});

describe('recordFromJson', () => {
  it('fills slots the input leaves out', () => {
    const record = recordFromJson({
      isin: { value: 'CH0000000001', confidence: 0.8, source: 'termsheet_text' },
    });
    expect(record.isin).toEqual({
      value: 'CH0000000001',
      confidence: 0.8,
      source: 'termsheet_text',
      evidence: null,
    });
    expect(record.currency.value).toBeNull();
  });

  it('clamps a stored confidence and fills an empty source', () => {
    const record = recordFromJson({
      isin: { value: 'CH0000000001', confidence: 1.5, source: '  ' },
      currency: { value: 'CHF', confidence: -0.2, source: 'catalog_api' },
    });
    expect(record.isin).toEqual({
      value: 'CH0000000001',
      confidence: 1,
      source: 'unknown',
      evidence: null,
    });
    expect(record.currency.confidence).toBe(0);
  });
});

describe('withField', () => {
  it('returns a copy and leaves the original alone', () => {
    const original = createEmptyRecord();
    const updated = withField(original, 'currency', makeField('EUR', 0.9, 'catalog_api'));
    expect(updated.currency.value).toBe('EUR');
    expect(original.currency.value).toBeNull();
  });
});

describe('recordsEqual', () => {
  it('ignores id and audit trail', () => {
    const a = withField(createEmptyRecord(), 'isin', makeField('CH0000000001', 0.9, 'a'));
    const b = {
      ...a,
      id: 'row-1',
      auditTrail: [{ field: 'isin', from: 'a', to: 'b', reason: 'higher_confidence' }],
    };
    expect(recordsEqual(a, b)).toBe(true);
  });

  it('compares confidence and source, not just values', () => {
    const a = withField(createEmptyRecord(), 'isin', makeField('CH0000000001', 0.9, 'a'));
    const b = withField(createEmptyRecord(), 'isin', makeField('CH0000000001', 0.8, 'a'));
    expect(recordsEqual(a, b)).toBe(false);
  });
});

describe('hasContent', () => {
  it('can ignore named slots', () => {
    const record = withField(createEmptyRecord(), 'isin', makeField('CH0000000001', 0.6, 'x'));
    expect(hasContent(record)).toBe(true);
    expect(hasContent(record, ['isin'])).toBe(false);
  });

  it('counts non-empty lists', () => {
    const record = createEmptyRecord();
    record.underlyings = [createEmptyUnderlying()];
    expect(hasContent(record)).toBe(true);
  });
});
