/**
 * Test fixture factories for ledger records.
 */

import { Categorizer } from '../../src/reconciliation/categorizer';
import type { CategoryKeywordTable, TransactionRecord } from '../../src/reconciliation/types';

/** Confidence high enough to pass both the ingestion check and the audit */
export const HIGH_CONFIDENCE = { vendor: 0.95, amount: 0.95, date: 0.95, category: 0.95 };

/** Local-time reference instant: Saturday 15 June 2024 */
export const NOW = new Date(2024, 5, 15, 12, 0, 0);

export const createTestRecord = (overrides: Partial<TransactionRecord> = {}): TransactionRecord => ({
  id: 1,
  date: '2024-06-10',
  vendor: 'Test Vendor',
  income: 0,
  expense: 100,
  transactionType: 'expense',
  currency: 'PKR',
  category: 'Other',
  notes: null,
  confidence: { ...HIGH_CONFIDENCE },
  isDuplicate: false,
  duplicateOf: null,
  needsReview: false,
  remainingBalance: 0,
  sourceFile: 'receipt-001.jpg',
  rawText: null,
  ...overrides,
});

export const createIncomeRecord = (overrides: Partial<TransactionRecord> = {}): TransactionRecord =>
  createTestRecord({ income: 500, expense: 0, transactionType: 'income', vendor: 'Client Payment', ...overrides });

export const TEST_CATEGORY_TABLE: CategoryKeywordTable = {
  Food: { en: ['restaurant', 'pizza'], 'ur-Latn': ['khana'] },
  Transport: { en: ['uber', 'taxi'] },
  Other: {},
};

export const createTestCategorizer = (): Categorizer => new Categorizer(TEST_CATEGORY_TABLE);
