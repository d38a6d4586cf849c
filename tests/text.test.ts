import { describe, it, expect } from 'vitest';
import {
  contentHashFor,
  normalizeWhitespace,
  parseNumberCh,
  parseSwissDate,
  sha256Hex,
  truncateExcerpt,
} from '@tessera/core';

describe('parseNumberCh', () => {
  it.each([
    ["1'234.56", 1234.56],
    ['1’234,56', 1234.56],
    ['12,5%', 12.5],
    ['CHF 1 000', 1000],
    ['1,234.56', 1234.56],
    ['-3.5', -3.5],
  ])('parses %s', (input, expected) => {
    expect(parseNumberCh(input)).toBe(expected);
  });

  it('returns null for text without a number', () => {
    expect(parseNumberCh('n/a')).toBeNull();
    expect(parseNumberCh('')).toBeNull();
    expect(parseNumberCh(null)).toBeNull();
  });
});

describe('parseSwissDate', () => {
  it('converts day-first dates to ISO', () => {
    expect(parseSwissDate('03.07.2026')).toBe('2026-07-03');
    expect(parseSwissDate('3/7/2026')).toBe('2026-07-03');
  });

  it('passes ISO dates through, dropping any time', () => {
    expect(parseSwissDate('2026-07-03T08:00:00Z')).toBe('2026-07-03');
  });

  it('rejects impossible months', () => {
    expect(parseSwissDate('31.13.2026')).toBeNull();
  });
});

describe('excerpts', () => {
  it('collapses whitespace', () => {
    expect(normalizeWhitespace('  Coupon \n\t 7.5% ')).toBe('Coupon 7.5%');
  });

  it('truncates long evidence with an ellipsis', () => {
    const excerpt = truncateExcerpt('x'.repeat(250));
    expect(excerpt).toHaveLength(200);
    expect(excerpt.endsWith('...')).toBe(true);
  });
});

describe('hashing', () => {
  it('hashes the empty string to the known SHA-256 digest', () => {
    expect(sha256Hex('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('keys API records by source and identifier', () => {
    expect(contentHashFor('catalog_api', 'CH0000000001')).toBe(
      sha256Hex('catalog_api:CH0000000001'),
    );
    expect(contentHashFor('catalog_api', 'CH0000000001')).not.toBe(
      contentHashFor('quote_page', 'CH0000000001'),
    );
  });
});
