import { z } from 'zod';
import {
  booleanField,
  flagsField,
  numberField,
  ratesField,
  stringField,
  textsField,
} from './field';

export const underlyingSchema = z.object({
  name: stringField(),
  isin: stringField(),
  bloombergTicker: stringField(),
  ricCode: stringField(),
  exchange: stringField(),
  referenceCurrency: stringField(),
  initialLevel: numberField(),
  strikeLevel: numberField(),
  strikePctOfInitial: numberField(),
  barrierLevel: numberField(),
  barrierPctOfInitial: numberField(),
  weightPct: numberField(),
});
export type Underlying = z.infer<typeof underlyingSchema>;

export const couponScheduleItemSchema = z.object({
  date: stringField(),
  amount: numberField(),
  currency: stringField(),
});
export type CouponScheduleItem = z.infer<typeof couponScheduleItemSchema>;

export const auditEntrySchema = z.object({
  field: z.string(),
  from: z.string(),
  to: z.string(),
  reason: z.string(),
});
export type AuditEntry = z.infer<typeof auditEntrySchema>;

/** Every single-valued slot of a record, grouped the way term sheets are laid out. */
export const scalarFieldsSchema = z.object({
  // Document metadata
  sourceFileName: stringField(),
  sourceFileHashSha256: stringField(),
  documentLanguage: stringField(),
  documentTimestamp: stringField(),
  documentType: stringField(),
  parseVersion: stringField(),
  parseConfidence: numberField(),

  // Issuer and parties
  issuerName: stringField(),
  issuerRating: stringField(),
  issuerRegulator: stringField(),
  calculationAgent: stringField(),
  payingAgent: stringField(),
  leadManager: stringField(),
  governingLaw: stringField(),
  jurisdiction: stringField(),
  riskDisclosureFlags: flagsField(),

  // Identification
  productName: stringField(),
  productType: stringField(),
  sspaCategory: stringField(),
  valorNumber: stringField(),
  isin: stringField(),
  tickerSix: stringField(),
  listingVenue: stringField(),

  // Monetary terms
  currency: stringField(),
  quanto: booleanField(),
  fxRiskFlag: booleanField(),
  issuePricePct: numberField(),
  denomination: numberField(),
  minInvestment: numberField(),
  tradeUnit: numberField(),
  terPct: numberField(),
  ievPct: numberField(),
  distributionFeePct: numberField(),
  marketExpectation: stringField(),
  yieldToMaturityPctPa: numberField(),
  worstToYieldPctPa: numberField(),

  // Coupon
  couponRatePctPa: numberField(),
  couponFrequency: stringField(),
  couponIsGuaranteed: booleanField(),
  taxCouponSplit: ratesField(),
  interestComponentPctPa: numberField(),
  premiumComponentPctPa: numberField(),

  // Dates
  subscriptionStart: stringField(),
  subscriptionEnd: stringField(),
  initialFixingDate: stringField(),
  settlementDate: stringField(),
  finalFixingDate: stringField(),
  maturityDate: stringField(),
  redemptionDate: stringField(),
  lastTradingDay: stringField(),

  // Barrier and payoff
  barrierType: stringField(),
  barrierObservationStart: stringField(),
  barrierObservationEnd: stringField(),
  barrierTriggerCondition: stringField(),
  worstOf: booleanField(),
  worstOfDefinition: stringField(),
  capLevelPct: numberField(),
  participationRatePct: numberField(),

  // Early redemption
  isCallable: booleanField(),
  callStyle: stringField(),
  callFirstPossibleAfter: stringField(),
  callRedemptionAmountRule: stringField(),

  // Settlement
  settlementType: stringField(),
  redemptionRules: textsField(),
  physicalDelivery: textsField(),
  payoffSummaryText: stringField(),
  secondaryMarketIntent: stringField(),
  pricingConvention: stringField(),
  custodianDepository: stringField(),
  clearingSettlement: stringField(),

  // Tax
  swissTaxClassification: stringField(),
  withholdingTaxInterestComponent: booleanField(),
  stampDutySecondaryMarket: booleanField(),
  taxNotesSnippet: stringField(),

  // Risk
  capitalProtection: booleanField(),
  maxLossDescription: stringField(),
  issuerCreditRisk: booleanField(),
  liquidityRiskFlag: booleanField(),
  riskSummary: stringField(),
});
export type ScalarFields = z.infer<typeof scalarFieldsSchema>;
export type ScalarFieldName = keyof ScalarFields;

/** Slots holding ordered lists. Merge treats each list as one unit. */
export const listFieldsSchema = z.object({
  underlyings: z.array(underlyingSchema).default(() => []),
  couponSchedule: z.array(couponScheduleItemSchema).default(() => []),
  callObservationDates: z.array(stringField()).default(() => []),
  callSettlementDates: z.array(stringField()).default(() => []),
  sellingRestrictions: z.array(stringField()).default(() => []),
});
export type ListFields = z.infer<typeof listFieldsSchema>;
export type ListFieldName = keyof ListFields;

export const normalizedRecordSchema = scalarFieldsSchema.merge(listFieldsSchema).extend({
  id: z.string().nullable().default(null),
  auditTrail: z.array(auditEntrySchema).default(() => []),
});
export type NormalizedRecord = z.infer<typeof normalizedRecordSchema>;
/** Serialised form; any slot may be left out. */
export type NormalizedRecordInput = z.input<typeof normalizedRecordSchema>;

export const SCALAR_FIELD_NAMES: readonly ScalarFieldName[] = scalarFieldsSchema.keyof().options;
export const LIST_FIELD_NAMES: readonly ListFieldName[] = listFieldsSchema.keyof().options;
