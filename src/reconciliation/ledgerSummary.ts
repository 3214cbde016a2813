/**
 * Ledger Summary
 *
 * Dashboard statistics over a record set: how many records are clean,
 * how many wait for review, money in and out, and how trustworthy the
 * extracted data is overall.
 *
 * Confidence bands (mean of each record's confidence vector):
 * - High: ≥0.8
 * - Medium: ≥0.6
 * - Low: below 0.6
 */

import { averageConfidence } from './confidenceAnalyzer';
import { fromMinorUnits, toMinorUnits } from './rounding';
import type { LedgerSummary, TransactionRecord } from './types';

const HIGH_BAND = 0.8;
const MEDIUM_BAND = 0.6;

export function summarizeLedger(records: readonly TransactionRecord[]): LedgerSummary {
  let income = 0n;
  let expense = 0n;
  let flaggedEntries = 0;
  let duplicates = 0;

  // Category names are caller data, so counts live in a Map, not an object literal
  const categoryCounts = new Map<string, number>();
  const confidenceDistribution = { High: 0, Medium: 0, Low: 0 };

  for (const record of records) {
    income += toMinorUnits(record.income) ?? 0n;
    expense += toMinorUnits(record.expense) ?? 0n;

    if (record.needsReview) flaggedEntries += 1;
    if (record.isDuplicate) duplicates += 1;

    categoryCounts.set(record.category, (categoryCounts.get(record.category) ?? 0) + 1);

    const mean = averageConfidence(record.confidence);
    if (mean >= HIGH_BAND) {
      confidenceDistribution.High += 1;
    } else if (mean >= MEDIUM_BAND) {
      confidenceDistribution.Medium += 1;
    } else {
      confidenceDistribution.Low += 1;
    }
  }

  return {
    totalEntries: records.length,
    cleanEntries: records.length - flaggedEntries,
    flaggedEntries,
    duplicates,
    totalIncome: fromMinorUnits(income),
    totalExpense: fromMinorUnits(expense),
    netAmount: fromMinorUnits(income - expense),
    categoryBreakdown: Object.fromEntries(categoryCounts),
    confidenceDistribution,
  };
}

export default summarizeLedger;
