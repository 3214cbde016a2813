/**
 * Similarity Scorer
 *
 * Combines four per-field scores into a single 0-100 similarity:
 *
 *   overall = amount × 0.40 + vendor × 0.40 + date × 0.15 + category × 0.05
 *
 * The breakdown is returned alongside so reviewers can see why two
 * records were paired.
 */

import { calculateAmountScore, extractAmount } from './amountProximity';
import { calculateDateScore } from './dateProximity';
import { extractVendorText } from './normalizeVendor';
import { calculateVendorSimilarity } from './vendorSimilarity';
import { DEFAULT_CONFIG } from './config';
import { round2 } from './rounding';
import type { ReconciliationConfig } from './config';
import type { SimilarityBreakdown, SimilarityResult, TransactionLike } from './types';

export type SimilarityOptions = Pick<ReconciliationConfig, 'similarityWeights' | 'dateOrder'>;

/**
 * Exact case-folded category match.
 */
export function calculateCategoryScore(
  a: string | null | undefined,
  b: string | null | undefined
): number {
  const first = (a ?? '').trim().toLowerCase();
  const second = (b ?? '').trim().toLowerCase();

  if (!first || !second) {
    return 0;
  }

  return first === second ? 100 : 0;
}

/**
 * Scores how alike two transaction-like records are.
 *
 * Pure and symmetric: scoreSimilarity(a, b) equals scoreSimilarity(b, a).
 *
 * @example
 * scoreSimilarity(
 *   { date: '2024-01-10', vendor: 'KFC Johar', expense: 550 },
 *   { date: '2024-01-10', vendor: 'KFC Johar Town', expense: 555 }
 * )
 * // { overall: 92.14, breakdown: { amount: 100, vendor: 92.86, date: 100, category: 0 } }
 */
export function scoreSimilarity(
  a: TransactionLike,
  b: TransactionLike,
  options: SimilarityOptions = DEFAULT_CONFIG
): SimilarityResult {
  const breakdown: SimilarityBreakdown = {
    amount: calculateAmountScore(extractAmount(a), extractAmount(b)),
    vendor: calculateVendorSimilarity(extractVendorText(a), extractVendorText(b)),
    date: calculateDateScore(a.date, b.date, options.dateOrder),
    category: calculateCategoryScore(a.category, b.category),
  };

  const weights = options.similarityWeights;
  const overall =
    breakdown.amount * weights.amount +
    breakdown.vendor * weights.vendor +
    breakdown.date * weights.date +
    breakdown.category * weights.category;

  return {
    overall: round2(overall),
    breakdown,
  };
}

/**
 * Human-readable explanation of a similarity result.
 */
export function explainSimilarity(result: SimilarityResult): string {
  const { breakdown } = result;

  return [
    `Amount: ${breakdown.amount}`,
    `Vendor: ${breakdown.vendor}`,
    `Date: ${breakdown.date}`,
    `Category: ${breakdown.category}`,
    `Overall: ${result.overall}`,
  ].join('. ');
}

export default scoreSimilarity;
