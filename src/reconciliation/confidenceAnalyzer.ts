/**
 * Confidence Analyzer
 *
 * Decides whether a freshly extracted record can be trusted as-is or
 * should go to a human. Every check runs; none short-circuits another.
 *
 * Checks:
 * - Date: missing, unparseable, in the future, older than maxDateAgeDays
 * - Amount: zero (critical), negative (critical), above amountCeiling (advisory)
 * - Vendor: missing or "Unknown", mostly special characters, too long
 * - Confidence vector: a warning per field below lowFieldConfidence
 *
 * needsReview = any flag OR mean confidence < needsReviewConfidence OR amount is 0
 */

import { DEFAULT_CONFIG } from './config';
import { dayDifference, parseDate, startOfDay } from './dateNormalizer';
import { specialCharacterRatio } from './normalizeVendor';
import { round2 } from './rounding';
import type { ReconciliationConfig } from './config';
import type {
  ConfidenceAnalysis,
  ConfidenceField,
  ConfidenceIssue,
  ConfidenceLevel,
  ConfidenceVector,
  TransactionLike,
} from './types';

export interface ConfidenceSubject extends TransactionLike {
  confidence?: Partial<ConfidenceVector> | null;
}

export interface ConfidenceOptions {
  config?: ReconciliationConfig;
  /** Reference instant for "future" and "too old"; defaults to the current time */
  now?: Date;
}

const CONFIDENCE_FIELDS: ConfidenceField[] = ['vendor', 'amount', 'date', 'category', 'transactionType'];

const FIELD_LABELS: Record<ConfidenceField, string> = {
  vendor: 'Vendor',
  amount: 'Amount',
  date: 'Date',
  category: 'Category',
  transactionType: 'Transaction type',
};

// ============================================
// Field checks
// ============================================

function checkDate(
  text: string | null | undefined,
  config: ReconciliationConfig,
  now: Date
): ConfidenceIssue[] {
  if (!text || !text.trim()) {
    return [{ field: 'date', code: 'DATE_MISSING', severity: 'advisory', message: 'Date is missing' }];
  }

  const parsed = parseDate(text, { dateOrder: config.dateOrder });
  if (!parsed.ok) {
    return [
      {
        field: 'date',
        code: 'DATE_UNPARSEABLE',
        severity: 'critical',
        message: `Date "${text.trim()}" is not in a recognized format`,
      },
    ];
  }

  const ageInDays = dayDifference(parsed.date, startOfDay(now));

  if (ageInDays < 0) {
    return [
      {
        field: 'date',
        code: 'DATE_IN_FUTURE',
        severity: 'advisory',
        message: 'Date is in the future. Please verify.',
      },
    ];
  }

  if (ageInDays > config.maxDateAgeDays) {
    return [
      {
        field: 'date',
        code: 'DATE_TOO_OLD',
        severity: 'advisory',
        message: `Date is more than ${config.maxDateAgeDays} days old. Please verify.`,
      },
    ];
  }

  return [];
}

function checkAmount(amount: number, config: ReconciliationConfig): ConfidenceIssue[] {
  if (amount === 0) {
    return [{ field: 'amount', code: 'AMOUNT_ZERO', severity: 'critical', message: 'Amount is zero or missing' }];
  }

  if (amount < 0) {
    return [{ field: 'amount', code: 'AMOUNT_NEGATIVE', severity: 'critical', message: 'Amount is negative' }];
  }

  if (amount > config.amountCeiling) {
    return [
      {
        field: 'amount',
        code: 'AMOUNT_TOO_HIGH',
        severity: 'advisory',
        message: 'Amount seems unusually high. Please verify.',
      },
    ];
  }

  return [];
}

function checkVendor(vendor: string | null | undefined, config: ReconciliationConfig): ConfidenceIssue[] {
  const text = (vendor ?? '').trim();

  if (!text || text.toLowerCase() === 'unknown') {
    return [
      {
        field: 'vendor',
        code: 'VENDOR_MISSING',
        severity: 'advisory',
        message: 'Vendor name is unknown or missing',
      },
    ];
  }

  const issues: ConfidenceIssue[] = [];

  if (specialCharacterRatio(text) > config.vendorMaxSpecialCharRatio) {
    issues.push({
      field: 'vendor',
      code: 'VENDOR_GARBLED',
      severity: 'advisory',
      message: 'Vendor name contains unusual characters. Extraction may have failed.',
    });
  }

  if (text.length > config.vendorMaxLength) {
    issues.push({
      field: 'vendor',
      code: 'VENDOR_TOO_LONG',
      severity: 'advisory',
      message: 'Vendor name is unusually long. Please verify.',
    });
  }

  return issues;
}

// ============================================
// Helpers
// ============================================

/**
 * The amount the plausibility checks look at.
 *
 * An explicit signed `amount` wins. Otherwise a negative income or expense
 * (which should never happen) is surfaced, then whichever side carries money.
 * Missing values count as 0.
 */
export function resolveCheckedAmount(record: TransactionLike): number {
  if (typeof record.amount === 'number' && Number.isFinite(record.amount)) {
    return record.amount;
  }

  const income = record.income ?? 0;
  const expense = record.expense ?? 0;

  if (income < 0) return income;
  if (expense < 0) return expense;

  return income > 0 ? income : expense;
}

function presentConfidences(
  confidence: Partial<ConfidenceVector> | null | undefined
): Array<[ConfidenceField, number]> {
  if (!confidence) {
    return [];
  }

  const present: Array<[ConfidenceField, number]> = [];
  for (const field of CONFIDENCE_FIELDS) {
    const value = confidence[field];
    if (typeof value === 'number' && Number.isFinite(value)) {
      present.push([field, value]);
    }
  }

  return present;
}

/**
 * Mean of the scored confidence fields; 0 when none is scored.
 */
export function averageConfidence(confidence: Partial<ConfidenceVector> | null | undefined): number {
  const present = presentConfidences(confidence);
  if (present.length === 0) {
    return 0;
  }

  return present.reduce((sum, [, value]) => sum + value, 0) / present.length;
}

// ============================================
// Public API
// ============================================

/**
 * Analyzes one record and returns flags, warnings and a review verdict.
 *
 * @example
 * analyzeConfidence(
 *   { date: '2099-01-01', vendor: 'PSO', expense: 0, confidence: { vendor: 0.9, amount: 0.9, date: 0.9, category: 0.9 } },
 *   { now: new Date(2024, 5, 15) }
 * )
 * // flags: ['Date is in the future. Please verify.', 'Amount is zero or missing'], needsReview: true
 */
export function analyzeConfidence(
  record: ConfidenceSubject,
  options: ConfidenceOptions = {}
): ConfidenceAnalysis {
  const config = options.config ?? DEFAULT_CONFIG;
  const now = options.now ?? new Date();
  const amount = resolveCheckedAmount(record);

  const issues: ConfidenceIssue[] = [
    ...checkDate(record.date, config, now),
    ...checkAmount(amount, config),
    ...checkVendor(record.vendor, config),
  ];

  const confidences = presentConfidences(record.confidence);

  const warnings = confidences
    .filter(([, value]) => value < config.lowFieldConfidence)
    .map(
      ([field, value]) =>
        `${FIELD_LABELS[field]} has low confidence (${Math.round(value * 100)}%). Please review.`
    );

  const meanConfidence = averageConfidence(record.confidence);

  const needsReview =
    issues.length > 0 || meanConfidence < config.needsReviewConfidence || amount === 0;

  return {
    flags: issues.map((issue) => issue.message),
    warnings,
    issues,
    overallConfidence: round2(meanConfidence),
    needsReview,
  };
}

/**
 * Human-readable band for a 0-1 confidence score.
 *
 * @example
 * getConfidenceLevel(0.95) // 'High'
 * getConfidenceLevel(0.42) // 'Very Low'
 */
export function getConfidenceLevel(score: number): ConfidenceLevel {
  if (score >= 0.9) return 'High';
  if (score >= 0.7) return 'Medium';
  if (score >= 0.5) return 'Low';
  return 'Very Low';
}

export default analyzeConfidence;
