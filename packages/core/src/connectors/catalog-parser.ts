/**
 * Map a raw catalog API product onto a NormalizedRecord.
 * The API shape is loosely validated: a malformed section is treated as missing, not as an error.
 */

import { z } from 'zod';
import type { NormalizedRecord, Underlying } from '@tessera/schemas';
import { makeField } from '../field';
import { createEmptyRecord, createEmptyUnderlying } from '../record';
import { ParseFailure } from '../errors';
import { truncateExcerpt } from '../text';
import type { ParseOutcome } from '../parsing/types';

export const CATALOG_SOURCE = 'catalog_api';

const str = z.string().trim().min(1).optional().catch(undefined);
const num = z.number().finite().optional().catch(undefined);
const bool = z.boolean().optional().catch(undefined);
const idString = z
  .union([z.string().trim().min(1), z.number().int().transform(String)])
  .optional()
  .catch(undefined);

function section<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(
    (value) => (value !== null && typeof value === 'object' ? value : {}),
    z.object(shape),
  );
}

function list<T extends z.ZodTypeAny>(item: T) {
  return z.array(item).catch([]).default([]);
}

const componentSchema = z.object({
  name: str,
  isin: str,
  ricCode: str,
  bloombergTicker: str,
  currency: str,
  weight: num,
});

export const catalogProductSchema = z.object({
  identifiers: section({ isin: str, valor: idString, symbol: str }),
  underlying: section({ shortName: str, underlyingComponents: list(componentSchema) }),
  productType: section({ name: str, sspaCategory: str }),
  issuer: section({ name: str }),
  currency: str,
  denomination: num,
  calendar: section({
    finalFixingDate: str,
    issueDateTime: str,
    initialFixingDate: str,
    subscriptionStartDate: str,
    subscriptionEndDate: str,
    lastTradingDate: str,
  }),
  listings: section({ markets: list(z.object({ marketVenue: str })) }),
  levels: section({ strikeLevelAbs: num, barrierLevelAbs: num, knockInLevelAbs: num }),
  coupon: section({ rate: num, frequency: str, guaranteed: bool }),
  settlement: section({ type: str }),
  payoff: section({ participationRate: num, capLevelPct: num }),
});
export type CatalogProduct = z.infer<typeof catalogProductSchema>;

function isoDate(value: string | undefined): string | undefined {
  if (!value) return undefined;
  return /^\d{4}-\d{2}-\d{2}/.test(value) ? value.slice(0, 10) : value;
}

function componentToUnderlying(comp: z.infer<typeof componentSchema>): Underlying {
  const u = createEmptyUnderlying();
  if (comp.name) u.name = makeField(comp.name, 0.9, CATALOG_SOURCE);
  if (comp.isin) u.isin = makeField(comp.isin, 0.9, CATALOG_SOURCE);
  if (comp.ricCode) u.ricCode = makeField(comp.ricCode, 0.8, CATALOG_SOURCE);
  if (comp.bloombergTicker) {
    u.bloombergTicker = makeField(comp.bloombergTicker, 0.8, CATALOG_SOURCE);
  }
  if (comp.currency) u.referenceCurrency = makeField(comp.currency, 0.8, CATALOG_SOURCE);
  // API weights are fractions of 1
  if (comp.weight !== undefined) u.weightPct = makeField(comp.weight * 100, 0.8, CATALOG_SOURCE);
  return u;
}

function buildUnderlyings(p: CatalogProduct): Underlying[] {
  const { strikeLevelAbs, barrierLevelAbs, knockInLevelAbs } = p.levels;
  const productBarrier = barrierLevelAbs ?? knockInLevelAbs;
  const underlyings = p.underlying.underlyingComponents.map(componentToUnderlying);

  if (underlyings.length === 0) {
    const single = createEmptyUnderlying();
    if (p.underlying.shortName) {
      single.name = makeField(p.underlying.shortName, 0.8, CATALOG_SOURCE);
    }
    if (strikeLevelAbs !== undefined) {
      single.strikeLevel = makeField(strikeLevelAbs, 0.7, CATALOG_SOURCE);
    }
    if (productBarrier !== undefined) {
      single.barrierLevel = makeField(productBarrier, 0.7, CATALOG_SOURCE);
    }
    if (
      single.name.value !== null ||
      single.strikeLevel.value !== null ||
      single.barrierLevel.value !== null
    ) {
      underlyings.push(single);
    }
  }

  // Product-level levels stand in for components that carry none of their own.
  return underlyings.map((u) => ({
    ...u,
    strikeLevel:
      u.strikeLevel.value === null && strikeLevelAbs !== undefined
        ? makeField(strikeLevelAbs, 0.6, CATALOG_SOURCE)
        : u.strikeLevel,
    barrierLevel:
      u.barrierLevel.value === null && productBarrier !== undefined
        ? makeField(productBarrier, 0.6, CATALOG_SOURCE)
        : u.barrierLevel,
  }));
}

function toRecord(p: CatalogProduct, isin: string): NormalizedRecord {
  const s = CATALOG_SOURCE;
  const record = createEmptyRecord();

  record.isin = makeField(isin, 0.9, s, truncateExcerpt(`identifiers.isin: ${isin}`));
  const { valor, symbol } = p.identifiers;
  if (valor) {
    record.valorNumber = makeField(valor, 0.9, s, truncateExcerpt(`identifiers.valor: ${valor}`));
  }
  if (symbol) record.tickerSix = makeField(symbol, 0.8, s);

  if (p.underlying.shortName) record.productName = makeField(p.underlying.shortName, 0.8, s);
  if (p.productType.name) record.productType = makeField(p.productType.name, 0.8, s);
  if (p.productType.sspaCategory) {
    record.sspaCategory = makeField(p.productType.sspaCategory, 0.8, s);
  }
  if (p.issuer.name) record.issuerName = makeField(p.issuer.name, 0.9, s);
  if (p.currency) record.currency = makeField(p.currency, 0.9, s);
  if (p.denomination !== undefined) record.denomination = makeField(p.denomination, 0.9, s);

  const cal = p.calendar;
  const maturity = isoDate(cal.finalFixingDate);
  if (maturity) record.maturityDate = makeField(maturity, 0.9, s);
  const issue = isoDate(cal.issueDateTime);
  if (issue) record.settlementDate = makeField(issue, 0.8, s);
  const initialFixing = isoDate(cal.initialFixingDate);
  if (initialFixing) record.initialFixingDate = makeField(initialFixing, 0.8, s);
  const subStart = isoDate(cal.subscriptionStartDate);
  if (subStart) record.subscriptionStart = makeField(subStart, 0.8, s);
  const subEnd = isoDate(cal.subscriptionEndDate);
  if (subEnd) record.subscriptionEnd = makeField(subEnd, 0.8, s);
  const lastTrading = isoDate(cal.lastTradingDate);
  if (lastTrading) record.lastTradingDay = makeField(lastTrading, 0.8, s);

  const venues = p.listings.markets.flatMap((m) => (m.marketVenue ? [m.marketVenue] : []));
  if (venues.length > 0) record.listingVenue = makeField(venues.join(', '), 0.7, s);

  record.underlyings = buildUnderlyings(p);

  if (p.coupon.rate !== undefined) record.couponRatePctPa = makeField(p.coupon.rate, 0.8, s);
  if (p.coupon.frequency) record.couponFrequency = makeField(p.coupon.frequency, 0.8, s);
  if (p.coupon.guaranteed !== undefined) {
    record.couponIsGuaranteed = makeField(p.coupon.guaranteed, 0.7, s);
  }
  if (p.settlement.type) record.settlementType = makeField(p.settlement.type, 0.7, s);
  if (p.payoff.participationRate !== undefined) {
    record.participationRatePct = makeField(p.payoff.participationRate * 100, 0.7, s);
  }
  if (p.payoff.capLevelPct !== undefined) {
    record.capLevelPct = makeField(p.payoff.capLevelPct, 0.7, s);
  }

  return record;
}

/** Parse one API product. Never throws; a product without an ISIN yields an empty record. */
export function parseCatalogProduct(raw: unknown): ParseOutcome {
  const parsed = catalogProductSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      record: createEmptyRecord(),
      issues: [new ParseFailure(CATALOG_SOURCE, 'product is not an object')],
    };
  }
  const isin = parsed.data.identifiers.isin;
  if (!isin) {
    return {
      record: createEmptyRecord(),
      issues: [new ParseFailure(CATALOG_SOURCE, 'product missing ISIN')],
    };
  }
  return { record: toRecord(parsed.data, isin), issues: [] };
}
