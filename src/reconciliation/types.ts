/**
 * Type Definitions for the Reconciliation Engine
 *
 * These types define the input/output contracts for the engine.
 * The engine is pure and deterministic - no database or external dependencies.
 * Records come from an external extraction step and go back to an external
 * record store; nothing here owns their persistence.
 */

// ============================================
// RECORD TYPES
// ============================================

/** Identifier assigned by the record store (numeric or opaque string) */
export type RecordId = number | string;

export type TransactionKind = 'income' | 'expense';

/**
 * Per-field extraction confidence, each value in [0, 1].
 */
export interface ConfidenceVector {
  vendor: number;
  amount: number;
  date: number;
  category: number;
  transactionType?: number;
}

export type ConfidenceField = keyof ConfidenceVector;

/**
 * A reconciled ledger entry.
 *
 * `income` and `expense` are both non-negative; normally exactly one is non-zero.
 * `remainingBalance` is only meaningful after ledger recalculation.
 */
export interface TransactionRecord {
  id: RecordId | null;
  /** Calendar date text as supplied (ISO after normalization, when parseable) */
  date: string;
  vendor: string;
  income: number;
  expense: number;
  transactionType: TransactionKind;
  currency: string;
  category: string;
  notes: string | null;
  confidence: ConfidenceVector;
  isDuplicate: boolean;
  duplicateOf: RecordId | null;
  needsReview: boolean;
  remainingBalance: number;
  sourceFile: string;
  rawText: string | null;
}

/**
 * Loose, transaction-like shape accepted by the similarity scorer.
 * Extraction output and persisted records both fit it.
 */
export interface TransactionLike {
  id?: RecordId | null;
  date?: string | null;
  vendor?: string | null;
  merchant?: string | null;
  description?: string | null;
  income?: number | null;
  expense?: number | null;
  amount?: number | null;
  category?: string | null;
}

/**
 * Candidate as produced by the field-extraction provider.
 * Every field may be missing; `amount` may be signed.
 */
export interface RawCandidate extends TransactionLike {
  transactionType?: string | null;
  currency?: string | null;
  notes?: string | null;
  confidence?: Partial<Record<ConfidenceField, number>> | null;
  sourceFile?: string | null;
  rawText?: string | null;
}

// ============================================
// SIMILARITY / DUPLICATE TYPES
// ============================================

/**
 * Per-field similarity scores, each 0-100.
 */
export interface SimilarityBreakdown {
  amount: number;
  vendor: number;
  date: number;
  category: number;
}

export interface SimilarityResult {
  /** Weighted overall score (0-100) */
  overall: number;
  breakdown: SimilarityBreakdown;
}

export interface DuplicateMatch<T extends TransactionLike = TransactionLike> {
  matchedId: RecordId | null;
  matchedRecord: T;
  score: number;
  breakdown: SimilarityBreakdown;
  /** Human-readable account of the score */
  explanation: string;
}

// ============================================
// CONFIDENCE ANALYSIS TYPES
// ============================================

export type IssueSeverity = 'critical' | 'advisory';

export type IssueCode =
  | 'DATE_MISSING'
  | 'DATE_UNPARSEABLE'
  | 'DATE_IN_FUTURE'
  | 'DATE_TOO_OLD'
  | 'AMOUNT_ZERO'
  | 'AMOUNT_NEGATIVE'
  | 'AMOUNT_TOO_HIGH'
  | 'VENDOR_MISSING'
  | 'VENDOR_GARBLED'
  | 'VENDOR_TOO_LONG';

export interface ConfidenceIssue {
  field: 'date' | 'amount' | 'vendor';
  code: IssueCode;
  severity: IssueSeverity;
  message: string;
}

export interface ConfidenceAnalysis {
  flags: string[];
  warnings: string[];
  issues: ConfidenceIssue[];
  overallConfidence: number;
  needsReview: boolean;
}

export type ConfidenceLevel = 'High' | 'Medium' | 'Low' | 'Very Low';

// ============================================
// CATEGORIZATION TYPES
// ============================================

/**
 * Category -> language tag -> keywords.
 * e.g. { Food: { en: ['restaurant'], 'ur-Latn': ['khana'] } }
 */
export type CategoryKeywordTable = Record<string, Record<string, string[]>>;

export interface CategorizationResult {
  category: string;
  confidence: number;
}

export interface CategorySuggestion extends CategorizationResult {
  reasoning: string;
  matchedKeywords: string[];
  alternativeCategories: string[];
}

// ============================================
// LEDGER TYPES
// ============================================

export interface Balance {
  openingBalance: number;
  currentBalance: number;
  totalIncome: number;
  totalExpense: number;
  lastUpdated: string;
}

export interface LedgerTotals {
  income: number;
  expense: number;
  current: number;
}

export interface LedgerEntry {
  id: RecordId | null;
  runningBalance: number;
}

export interface LedgerResult {
  /** Annotated copies in chronological order */
  records: TransactionRecord[];
  entries: LedgerEntry[];
  totals: LedgerTotals;
  balance: Balance;
}

export interface LedgerSummary {
  totalEntries: number;
  cleanEntries: number;
  flaggedEntries: number;
  duplicates: number;
  totalIncome: number;
  totalExpense: number;
  netAmount: number;
  categoryBreakdown: Record<string, number>;
  confidenceDistribution: { High: number; Medium: number; Low: number };
}
