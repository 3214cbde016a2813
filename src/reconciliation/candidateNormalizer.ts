/**
 * Candidate Normalizer
 *
 * Field extraction hands over loose candidates: any field may be missing,
 * dates come in whatever format the receipt used, and money may arrive as
 * a single signed `amount`. This module turns such a candidate into a
 * complete TransactionRecord. It never rejects input; it substitutes a
 * default and lowers the confidence of the field instead.
 *
 * Defaults:
 * - date: today (confidence capped at 0.3); unparseable text is kept verbatim (capped at 0.3)
 * - vendor: "Unknown" (capped at 0.3)
 * - amount: 0 (capped at 0.3)
 * - transactionType: "expense"
 * - currency: config.defaultCurrency
 * - category: categorizer suggestion, else "Other" (capped at 0.3)
 * - confidence: 0.5 for every field the extractor did not score
 */

import { DEFAULT_CONFIG } from './config';
import { DEFAULT_FIELD_CONFIDENCE, FALLBACK_CATEGORY, SUBSTITUTED_FIELD_CONFIDENCE, UNKNOWN_VENDOR } from './constants';
import { parseDate, startOfDay, toIsoDate } from './dateNormalizer';
import type { Categorizer } from './categorizer';
import type { ReconciliationConfig } from './config';
import type { ConfidenceVector, RawCandidate, TransactionKind, TransactionRecord } from './types';

export interface NormalizeOptions {
  categorizer: Categorizer;
  config?: ReconciliationConfig;
  /** Used for the "today" default; defaults to the current time */
  now?: Date;
}

interface MoneySplit {
  income: number;
  expense: number;
  transactionType: TransactionKind;
  found: boolean;
}

// ============================================
// Helpers
// ============================================

function clampConfidence(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return DEFAULT_FIELD_CONFIDENCE;
  }

  return Math.min(1, Math.max(0, value));
}

function cap(value: number): number {
  return Math.min(value, SUBSTITUTED_FIELD_CONFIDENCE);
}

function cleanText(value: string | null | undefined): string {
  return (value ?? '').trim();
}

function parseKind(value: string | null | undefined): TransactionKind | null {
  const folded = cleanText(value).toLowerCase();
  return folded === 'income' || folded === 'expense' ? folded : null;
}

function magnitude(value: number | null | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.abs(value) : 0;
}

/**
 * Splits the candidate's money into non-negative income and expense.
 *
 * Explicit income/expense values win over a single `amount`. A declared
 * transaction type decides which side a single amount lands on;
 * otherwise it is an expense.
 */
function splitMoney(raw: RawCandidate): MoneySplit {
  const declared = parseKind(raw.transactionType);
  const income = magnitude(raw.income);
  const expense = magnitude(raw.expense);

  if (income > 0 || expense > 0) {
    const inferred: TransactionKind = income > 0 && expense === 0 ? 'income' : 'expense';
    return { income, expense, transactionType: declared ?? inferred, found: true };
  }

  const amount = magnitude(raw.amount);
  const transactionType = declared ?? 'expense';

  return {
    income: transactionType === 'income' ? amount : 0,
    expense: transactionType === 'expense' ? amount : 0,
    transactionType,
    found: amount > 0,
  };
}

// ============================================
// Public API
// ============================================

/**
 * Normalizes an extracted candidate into a full record.
 *
 * @example
 * normalizeCandidate(
 *   { date: '10/01/2024', vendor: 'KFC Johar Town', amount: -550 },
 *   { categorizer }
 * )
 * // { date: '2024-01-10', vendor: 'KFC Johar Town', expense: 550, income: 0,
 * //   transactionType: 'expense', category: 'Food', currency: 'PKR', ... }
 */
export function normalizeCandidate(raw: RawCandidate, options: NormalizeOptions): TransactionRecord {
  const config = options.config ?? DEFAULT_CONFIG;
  const now = options.now ?? new Date();
  const { categorizer } = options;

  const supplied = raw.confidence ?? {};
  const confidence: ConfidenceVector = {
    vendor: clampConfidence(supplied.vendor),
    amount: clampConfidence(supplied.amount),
    date: clampConfidence(supplied.date),
    category: clampConfidence(supplied.category),
  };
  if (supplied.transactionType !== undefined) {
    confidence.transactionType = clampConfidence(supplied.transactionType);
  }

  // Date
  const dateText = cleanText(raw.date);
  const parsed = parseDate(dateText, { dateOrder: config.dateOrder });
  let date: string;
  if (parsed.ok) {
    date = parsed.iso;
  } else {
    date = dateText || toIsoDate(startOfDay(now));
    confidence.date = cap(confidence.date);
  }

  // Vendor
  let vendor = cleanText(raw.vendor) || cleanText(raw.merchant) || cleanText(raw.description);
  if (!vendor) {
    vendor = UNKNOWN_VENDOR;
    confidence.vendor = cap(confidence.vendor);
  }

  // Money
  const money = splitMoney(raw);
  if (!money.found) {
    confidence.amount = cap(confidence.amount);
  }

  // Category
  const notes = cleanText(raw.notes) || null;
  const suppliedCategory = cleanText(raw.category).toLowerCase();
  const canonical = categorizer.getCategories().find((name) => name.toLowerCase() === suppliedCategory);

  let category = canonical ?? FALLBACK_CATEGORY;
  if (!canonical || canonical === FALLBACK_CATEGORY) {
    const suggestion = categorizer.categorize(vendor, notes);
    if (suggestion.category !== FALLBACK_CATEGORY) {
      category = suggestion.category;
      confidence.category = suggestion.confidence;
    } else if (!canonical) {
      confidence.category = cap(confidence.category);
    }
  }

  return {
    id: raw.id ?? null,
    date,
    vendor,
    income: money.income,
    expense: money.expense,
    transactionType: money.transactionType,
    currency: cleanText(raw.currency).toUpperCase() || config.defaultCurrency,
    category,
    notes,
    confidence,
    isDuplicate: false,
    duplicateOf: null,
    needsReview: false,
    remainingBalance: 0,
    sourceFile: cleanText(raw.sourceFile),
    rawText: raw.rawText ?? null,
  };
}

export default normalizeCandidate;
