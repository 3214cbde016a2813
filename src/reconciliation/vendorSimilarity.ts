/**
 * Vendor Similarity Calculator
 *
 * Two signals, both scaled to 0-100, the higher one wins:
 * - Levenshtein ratio (insert/delete distance over combined length),
 *   good for OCR typos anywhere in the string
 * - Jaro-Winkler, good when one name extends the other
 *   ("kfc johar" vs "kfc johar town")
 */

import natural from 'natural';
import { round2 } from './rounding';

/**
 * Costs that make a substitution equal to one delete plus one insert,
 * so the ratio is (total length - distance) / total length.
 */
const INDEL_COSTS = {
  insertion_cost: 1,
  deletion_cost: 1,
  substitution_cost: 2,
};

/**
 * Edit-distance ratio between two normalized strings.
 *
 * @example
 * levenshteinRatio('kfc johar', 'kfc johar town') // 78.26
 * levenshteinRatio('uber', 'ubr')                 // 85.71
 */
export function levenshteinRatio(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 100;
  }

  const totalLength = a.length + b.length;
  const distance = natural.LevenshteinDistance(a, b, INDEL_COSTS);

  return round2(((totalLength - distance) / totalLength) * 100);
}

/**
 * Jaro-Winkler similarity between two normalized strings (0-100).
 */
export function jaroWinklerSimilarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 100;
  }

  return round2(natural.JaroWinklerDistance(a, b, {}) * 100);
}

/**
 * Similarity between two normalized vendor strings.
 *
 * @returns 0 when either side is empty, 100 for identical strings
 *
 * @example
 * calculateVendorSimilarity('kfc johar', 'kfc johar town') // ~92.9
 * calculateVendorSimilarity('kfc', 'uber')                 // 0
 */
export function calculateVendorSimilarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 100;
  }

  return Math.max(levenshteinRatio(a, b), jaroWinklerSimilarity(a, b));
}

export default calculateVendorSimilarity;
