/**
 * Transaction Reconciliation Engine
 *
 * Pure, deterministic functions over in-memory transaction records:
 * - Similarity scoring and duplicate detection (amount, vendor, date, category)
 * - Confidence and plausibility analysis of extracted records
 * - Keyword categorization over a configurable multilingual table
 * - Chronological running-balance recalculation
 * - Risk alerts from a registry of independent rules
 *
 * Usage:
 * ```typescript
 * import { findDuplicates, recalculateLedger, RiskAnalyzer } from './reconciliation';
 *
 * const matches = findDuplicates(candidate, existingRecords);
 * const ledger = recalculateLedger(openingBalance, records);
 * const { alerts } = new RiskAnalyzer().analyze(ledger.records);
 * ```
 */

// Configuration
export { resolveConfig, DEFAULT_CONFIG, ReconciliationConfigSchema, DateOrderSchema } from './config';
export type { ReconciliationConfig, ReconciliationConfigInput, DateOrder } from './config';

// Dates
export { parseDate, normalizeDate, toIsoDate, startOfDay, dayDifference } from './dateNormalizer';
export type { DateParseResult } from './dateNormalizer';

// Similarity and duplicates
export { scoreSimilarity, explainSimilarity, calculateCategoryScore } from './similarityScorer';
export { calculateAmountScore, extractAmount } from './amountProximity';
export { calculateDateScore, daysBetween } from './dateProximity';
export { calculateVendorSimilarity } from './vendorSimilarity';
export { normalizeVendor, extractVendorText } from './normalizeVendor';
export {
  findDuplicates,
  batchCheck,
  selectDuplicateOf,
  markAsDuplicate,
  getDuplicateSummary,
} from './duplicateDetector';
export type { DuplicateOptions } from './duplicateDetector';

// Confidence
export { analyzeConfidence, getConfidenceLevel, averageConfidence } from './confidenceAnalyzer';
export type { ConfidenceSubject, ConfidenceOptions } from './confidenceAnalyzer';

// Categorization
export { Categorizer, CategoryKeywordTableSchema } from './categorizer';

// Candidates
export { normalizeCandidate } from './candidateNormalizer';
export type { NormalizeOptions } from './candidateNormalizer';

// Ledger
export { recalculateLedger, sortChronologically } from './ledgerRecalculator';
export type { LedgerOptions } from './ledgerRecalculator';
export { summarizeLedger } from './ledgerSummary';

// Risk
export * from './risk';

// Ids
export { compareRecordIds, isRecordId } from './recordIds';

// Types
export type {
  RecordId,
  TransactionKind,
  ConfidenceVector,
  ConfidenceField,
  TransactionRecord,
  TransactionLike,
  RawCandidate,
  SimilarityBreakdown,
  SimilarityResult,
  DuplicateMatch,
  IssueSeverity,
  IssueCode,
  ConfidenceIssue,
  ConfidenceAnalysis,
  ConfidenceLevel,
  CategoryKeywordTable,
  CategorizationResult,
  CategorySuggestion,
  Balance,
  LedgerTotals,
  LedgerEntry,
  LedgerResult,
  LedgerSummary,
} from './types';
