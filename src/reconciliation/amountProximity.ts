/**
 * Amount Proximity Scoring
 *
 * Duplicates rarely disagree by much: a rounded total, a tip added on the
 * card slip, a misread digit. The score falls in tiers by percentage
 * difference, then linearly.
 *
 * - ≤1%: 100
 * - ≤5%: 90
 * - ≤10%: 70
 * - otherwise: 100 - 1.5 × difference, floored at 0
 */

import { AMOUNT_PROXIMITY, AMOUNT_SCORES } from './constants';
import { round2 } from './rounding';
import type { TransactionLike } from './types';

function isUsable(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value !== 0;
}

/**
 * Representative magnitude of a record: income, then expense, then a
 * generic amount. Zero and missing values are skipped.
 *
 * @returns null when none of the three carries a value
 *
 * @example
 * extractAmount({ income: 0, expense: 550 }) // 550
 * extractAmount({ amount: -1200 })           // 1200
 * extractAmount({ income: 0, expense: 0 })   // null
 */
export function extractAmount(record: TransactionLike): number | null {
  for (const value of [record.income, record.expense, record.amount]) {
    if (isUsable(value)) {
      return Math.abs(value);
    }
  }

  return null;
}

/**
 * Percentage difference relative to the larger magnitude.
 */
export function percentageDifference(a: number, b: number): number {
  const larger = Math.max(Math.abs(a), Math.abs(b));
  if (larger === 0) {
    return 0;
  }

  return (Math.abs(a - b) / larger) * 100;
}

/**
 * Scores two amounts 0-100.
 *
 * @example
 * calculateAmountScore(550, 555)   // 100 (0.9%)
 * calculateAmountScore(1000, 1040) // 90  (3.8%)
 * calculateAmountScore(100, 80)    // 70  (20% → 100 - 30)
 */
export function calculateAmountScore(a: number | null, b: number | null): number {
  if (a === null || b === null) {
    return 0;
  }

  if (a === b) {
    return 100;
  }

  const difference = percentageDifference(a, b);

  if (difference <= AMOUNT_PROXIMITY.NEAR_EXACT) {
    return AMOUNT_SCORES.NEAR_EXACT;
  }

  if (difference <= AMOUNT_PROXIMITY.CLOSE) {
    return AMOUNT_SCORES.CLOSE;
  }

  if (difference <= AMOUNT_PROXIMITY.MODERATE) {
    return AMOUNT_SCORES.MODERATE;
  }

  return Math.max(0, round2(100 - AMOUNT_SCORES.DECAY_PER_PERCENT * difference));
}

export default calculateAmountScore;
