/**
 * Engine configuration.
 *
 * Every tunable threshold of the engine lives here as a named value.
 * Callers pass partial overrides; missing values fall back to ./constants.
 */

import { z } from 'zod';
import {
  AMOUNT_CEILING,
  AUDIT_CONFIDENCE,
  CATEGORY_SHIFT_PERCENT,
  DEFAULT_CURRENCY,
  DEPLETION_HORIZON_DAYS,
  DUPLICATE_THRESHOLD,
  FIRST_TIME_VENDOR_MULTIPLIER,
  LARGE_TRANSACTION_MULTIPLIER,
  LOW_FIELD_CONFIDENCE,
  MAX_DATE_AGE_DAYS,
  NEEDS_REVIEW_CONFIDENCE,
  RISK_DUPLICATE_THRESHOLD,
  SIMILARITY_WEIGHTS,
  SUBSCRIPTION_INTERVAL_DAYS,
  SUBSCRIPTION_MIN_OCCURRENCES,
  TAX_DEDUCTIBLE_CATEGORIES,
  TAX_DEDUCTIBLE_MIN_AMOUNT,
  VENDOR_MAX_LENGTH,
  VENDOR_MAX_SPECIAL_CHAR_RATIO,
  WEEKEND_SPIKE_MULTIPLIER,
} from './constants';

const score = z.number().min(0).max(100);
const probability = z.number().min(0).max(1);
const positive = z.number().positive();

/**
 * Which of the day/month orderings is tried first for ambiguous
 * numeric dates such as 03/04/2024.
 */
export const DateOrderSchema = z.enum(['DMY', 'MDY']);

export type DateOrder = z.infer<typeof DateOrderSchema>;

export const ReconciliationConfigSchema = z
  .object({
    duplicateThreshold: score.default(DUPLICATE_THRESHOLD),
    riskDuplicateThreshold: score.default(RISK_DUPLICATE_THRESHOLD),
    similarityWeights: z
      .object({
        amount: probability.default(SIMILARITY_WEIGHTS.amount),
        vendor: probability.default(SIMILARITY_WEIGHTS.vendor),
        date: probability.default(SIMILARITY_WEIGHTS.date),
        category: probability.default(SIMILARITY_WEIGHTS.category),
      })
      .default({}),
    amountCeiling: positive.default(AMOUNT_CEILING),
    needsReviewConfidence: probability.default(NEEDS_REVIEW_CONFIDENCE),
    lowFieldConfidence: probability.default(LOW_FIELD_CONFIDENCE),
    maxDateAgeDays: z.number().int().positive().default(MAX_DATE_AGE_DAYS),
    vendorMaxLength: z.number().int().positive().default(VENDOR_MAX_LENGTH),
    vendorMaxSpecialCharRatio: probability.default(VENDOR_MAX_SPECIAL_CHAR_RATIO),
    auditConfidence: probability.default(AUDIT_CONFIDENCE),
    largeTransactionMultiplier: positive.default(LARGE_TRANSACTION_MULTIPLIER),
    categoryShiftPercent: positive.default(CATEGORY_SHIFT_PERCENT),
    subscriptionMinOccurrences: z.number().int().min(2).default(SUBSCRIPTION_MIN_OCCURRENCES),
    subscriptionIntervalDays: z
      .object({
        min: positive.default(SUBSCRIPTION_INTERVAL_DAYS.min),
        max: positive.default(SUBSCRIPTION_INTERVAL_DAYS.max),
      })
      .refine((window) => window.min <= window.max, {
        message: 'subscriptionIntervalDays.min must not exceed max',
      })
      .default({}),
    depletionHorizonDays: z.number().int().positive().default(DEPLETION_HORIZON_DAYS),
    firstTimeVendorMultiplier: positive.default(FIRST_TIME_VENDOR_MULTIPLIER),
    weekendSpikeMultiplier: positive.default(WEEKEND_SPIKE_MULTIPLIER),
    taxDeductibleMinAmount: z.number().min(0).default(TAX_DEDUCTIBLE_MIN_AMOUNT),
    taxDeductibleCategories: z.array(z.string().min(1)).default([...TAX_DEDUCTIBLE_CATEGORIES]),
    dateOrder: DateOrderSchema.default('DMY'),
    defaultCurrency: z.string().min(3).max(3).default(DEFAULT_CURRENCY),
  })
  .refine(
    (config) => {
      const { amount, vendor, date, category } = config.similarityWeights;
      return Math.abs(amount + vendor + date + category - 1) < 1e-9;
    },
    { message: 'similarityWeights must sum to 1', path: ['similarityWeights'] }
  );

export type ReconciliationConfig = z.infer<typeof ReconciliationConfigSchema>;

export type ReconciliationConfigInput = z.input<typeof ReconciliationConfigSchema>;

/**
 * Builds a complete configuration from partial overrides.
 *
 * @throws ZodError when an override is out of range
 *
 * @example
 * resolveConfig({ duplicateThreshold: 80, dateOrder: 'MDY' })
 */
export function resolveConfig(overrides: ReconciliationConfigInput = {}): ReconciliationConfig {
  return ReconciliationConfigSchema.parse(overrides);
}

export const DEFAULT_CONFIG: ReconciliationConfig = resolveConfig();

export default resolveConfig;
