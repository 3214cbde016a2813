/**
 * Vendor Text Normalization
 *
 * Extracted vendor names differ in case and surrounding whitespace.
 * Receipts without a vendor line often carry the payee in a merchant
 * or description field instead.
 *
 * Example transformations:
 * - "  KFC Johar Town " → "kfc johar town"
 * - { merchant: "Careem" } → "careem"
 */

import type { TransactionLike } from './types';

/**
 * Case-folds and trims a vendor string, collapsing inner whitespace.
 *
 * @example
 * normalizeVendor('  PSO   Petrol ') // Returns: "pso petrol"
 * normalizeVendor(null)             // Returns: ""
 */
export function normalizeVendor(input: string | null | undefined): string {
  if (!input || typeof input !== 'string') {
    return '';
  }

  return input.toLowerCase().trim().replace(/\s+/g, ' ');
}

/**
 * Picks the payee text of a record: vendor, then merchant, then description.
 * Returns the normalized form, or "" when none is present.
 */
export function extractVendorText(record: TransactionLike): string {
  for (const candidate of [record.vendor, record.merchant, record.description]) {
    const normalized = normalizeVendor(candidate);
    if (normalized) {
      return normalized;
    }
  }

  return '';
}

/**
 * Share of characters that are neither letters, digits nor whitespace.
 * Letters from any script count as letters.
 */
export function specialCharacterRatio(input: string): number {
  if (!input) {
    return 0;
  }

  const special = input.match(/[^\p{L}\p{N}\s]/gu);
  return (special?.length ?? 0) / input.length;
}

export default normalizeVendor;
