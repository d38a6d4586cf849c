import { describe, it, expect } from 'vitest';
import {
  createEmptyRecord,
  createEmptyUnderlying,
  makeField,
  mergeRecords,
  recordsEqual,
  withField,
} from '@tessera/core';
import { SCALAR_FIELD_NAMES, type NormalizedRecord } from '@tessera/schemas';

function sampleRecord(): NormalizedRecord {
  let record = createEmptyRecord();
  record = withField(record, 'isin', makeField('CH0000000001', 0.9, 'catalog_api'));
  record = withField(record, 'currency', makeField('CHF', 0.9, 'catalog_api'));
  record = withField(record, 'couponRatePctPa', makeField(6.5, 0.8, 'catalog_api'));
  const underlying = createEmptyUnderlying();
  underlying.name = makeField('Test Holding', 0.9, 'catalog_api');
  record.underlyings = [underlying];
  return record;
}

function sampleSchedule(): NormalizedRecord['couponSchedule'] {
  return [
    {
      date: makeField('2026-06-15', 0.8, 'quote_page'),
      amount: makeField(3.25, 0.8, 'quote_page'),
      currency: makeField('CHF', 0.8, 'quote_page'),
    },
  ];
}

describe('mergeRecords', () => {
  it('is idempotent for any allow-list', () => {
    const record = sampleRecord();
    for (const prefer of [[], SCALAR_FIELD_NAMES]) {
      const { merged, auditEntries } = mergeRecords(record, record, prefer);
      expect(recordsEqual(merged, record)).toBe(true);
      expect(auditEntries).toEqual([]);
      expect(merged.auditTrail).toEqual(record.auditTrail);
    }
  });

  it('fills an absent slot from secondary without an audit entry', () => {
    const primary = createEmptyRecord();
    const secondary = withField(
      createEmptyRecord(),
      'isin',
      makeField('CH0012345678', 0.7, 'quote_page', 'ISIN CH0012345678'),
    );
    const { merged, auditEntries } = mergeRecords(primary, secondary);
    expect(merged.isin.value).toBe('CH0012345678');
    expect(merged.isin).toEqual(secondary.isin);
    expect(auditEntries).toEqual([]);
  });

  it('overrides an allow-listed slot and records the override', () => {
    const primary = withField(createEmptyRecord(), 'couponRatePctPa', makeField(1.0, 0.5, 'a'));
    const secondary = withField(createEmptyRecord(), 'couponRatePctPa', makeField(2.0, 0.9, 'b'));

    const { merged, auditEntries } = mergeRecords(primary, secondary, ['couponRatePctPa']);

    expect(merged.couponRatePctPa.value).toBe(2.0);
    expect(merged.couponRatePctPa.source).toBe('b');
    expect(auditEntries).toEqual([
      { field: 'couponRatePctPa', from: 'a', to: 'b', reason: 'higher_confidence' },
    ]);
    expect(merged.auditTrail).toEqual(auditEntries);
  });

  it('keeps primary for slots not on the allow-list even at higher secondary confidence', () => {
    const primary = withField(createEmptyRecord(), 'couponRatePctPa', makeField(1.0, 0.5, 'a'));
    const secondary = withField(createEmptyRecord(), 'couponRatePctPa', makeField(2.0, 0.9, 'b'));

    const { merged, auditEntries } = mergeRecords(primary, secondary);

    expect(merged.couponRatePctPa.value).toBe(1.0);
    expect(merged.couponRatePctPa.source).toBe('a');
    expect(auditEntries).toEqual([]);
  });

  it('does not record an override when allow-listed values are equal', () => {
    const primary = withField(createEmptyRecord(), 'capLevelPct', makeField(120, 0.5, 'a'));
    const secondary = withField(createEmptyRecord(), 'capLevelPct', makeField(120, 0.9, 'b'));
    const { merged, auditEntries } = mergeRecords(primary, secondary, ['capLevelPct']);
    expect(merged.capLevelPct.source).toBe('a');
    expect(auditEntries).toEqual([]);
  });

  it('never replaces a present value with an absent one', () => {
    const primary = sampleRecord();
    const { merged } = mergeRecords(primary, createEmptyRecord(), SCALAR_FIELD_NAMES);
    expect(merged.couponRatePctPa.value).toBe(6.5);
  });

  it('takes a list wholesale only when primary has none', () => {
    const withList = sampleRecord();
    const other = createEmptyUnderlying();
    other.name = makeField('Other Holding', 0.9, 'quote_page');
    const secondary = { ...createEmptyRecord(), underlyings: [other] };

    expect(mergeRecords(createEmptyRecord(), secondary).merged.underlyings).toEqual([other]);
    expect(mergeRecords(withList, secondary).merged.underlyings).toEqual(withList.underlyings);
  });

  it('keeps the primary id and appends to its audit trail', () => {
    const earlier = { field: 'currency', from: 'x', to: 'y', reason: 'higher_confidence' };
    const primary = {
      ...withField(createEmptyRecord(), 'couponRatePctPa', makeField(1.0, 0.5, 'a')),
      id: 'primary-id',
      auditTrail: [earlier],
    };
    const secondary = {
      ...withField(createEmptyRecord(), 'couponRatePctPa', makeField(2.0, 0.9, 'b')),
      id: 'secondary-id',
    };

    const { merged } = mergeRecords(primary, secondary, ['couponRatePctPa']);

    expect(merged.id).toBe('primary-id');
    expect(merged.auditTrail).toEqual([
      earlier,
      { field: 'couponRatePctPa', from: 'a', to: 'b', reason: 'higher_confidence' },
    ]);
  });

  it('does not mutate its inputs', () => {
    const primary = withField(createEmptyRecord(), 'couponRatePctPa', makeField(1.0, 0.5, 'a'));
    const secondary = withField(createEmptyRecord(), 'isin', makeField('CH0000000001', 0.9, 'b'));
    mergeRecords(primary, secondary, ['couponRatePctPa']);
    expect(primary.isin.value).toBeNull();
    expect(primary.auditTrail).toEqual([]);
  });

  it('returns lists that are not shared with either input', () => {
    const primary = sampleRecord();
    const secondary = { ...createEmptyRecord(), couponSchedule: sampleSchedule() };

    const { merged } = mergeRecords(primary, secondary);
    merged.underlyings.push(createEmptyUnderlying());
    merged.couponSchedule.push(...sampleSchedule());

    expect(primary.underlyings).toHaveLength(1);
    expect(secondary.couponSchedule).toHaveLength(1);
    expect(merged.couponSchedule).toHaveLength(2);
  });
});
