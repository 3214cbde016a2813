/**
 * Constants for the Reconciliation Engine
 *
 * These values are the defaults behind ReconciliationConfig.
 * Every threshold here can be overridden per deployment; see ./config.
 */

// ============================================
// DUPLICATE THRESHOLDS
// ============================================

/**
 * Minimum overall similarity (0-100) for a candidate to be reported as a
 * possible duplicate during ingestion.
 *
 * Example (same vendor, same day, category unknown):
 * - amount ≤1% apart (100) + vendor 93 + date 100 → 92.2 → duplicate ✓
 * - amount 12% apart (82) + vendor 60 + date 0 → 56.8 → not a duplicate
 */
export const DUPLICATE_THRESHOLD = 70;

/**
 * Stricter threshold used by the risk audit, which looks for charges that
 * were almost certainly booked twice.
 */
export const RISK_DUPLICATE_THRESHOLD = 90;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Weights for the overall similarity score. They sum to 1.
 *
 * Amount and vendor together are the strongest duplicate signal,
 * date corroborates, category barely counts (unrelated purchases
 * routinely share a category).
 */
export const SIMILARITY_WEIGHTS = {
  amount: 0.4,
  vendor: 0.4,
  date: 0.15,
  category: 0.05,
} as const;

// ============================================
// AMOUNT PROXIMITY (percentage difference)
// ============================================

export const AMOUNT_PROXIMITY = {
  /** Rounding noise, e.g. 550 vs 555 */
  NEAR_EXACT: 1,
  CLOSE: 5,
  MODERATE: 10,
} as const;

export const AMOUNT_SCORES = {
  NEAR_EXACT: 100,
  CLOSE: 90,
  MODERATE: 70,
  /** Points lost per percent beyond MODERATE */
  DECAY_PER_PERCENT: 1.5,
} as const;

// ============================================
// DATE PROXIMITY (in days)
// ============================================

/**
 * Score for each day gap up to three days. Beyond that the score
 * decays by DATE_DECAY_PER_DAY and bottoms out at 0 after a week.
 */
export const DATE_GAP_SCORES: readonly number[] = [100, 85, 70, 50];

export const DATE_DECAY_PER_DAY = 15;

// ============================================
// CONFIDENCE ANALYSIS
// ============================================

/** Amounts above this (base currency) are flagged as implausibly high */
export const AMOUNT_CEILING = 1_000_000;

/** Mean confidence below this sends a record to human review */
export const NEEDS_REVIEW_CONFIDENCE = 0.7;

/** A single confidence field below this produces a warning */
export const LOW_FIELD_CONFIDENCE = 0.5;

/** Two years */
export const MAX_DATE_AGE_DAYS = 730;

export const VENDOR_MAX_LENGTH = 50;

/** Share of characters that are neither letters, digits nor whitespace */
export const VENDOR_MAX_SPECIAL_CHAR_RATIO = 0.3;

export const UNKNOWN_VENDOR = 'Unknown';

// ============================================
// CATEGORIZATION
// ============================================

export const FALLBACK_CATEGORY = 'Other';

export const FALLBACK_CATEGORY_CONFIDENCE = 0.3;

export const CATEGORY_POINTS = {
  /** Keyword found in the vendor name */
  VENDOR: 10,
  /** Keyword found only in vendor + notes */
  NOTES: 5,
} as const;

export const CATEGORY_CONFIDENCE = {
  BASE: 0.6,
  PER_MATCH: 0.1,
  PER_POINT: 0.01,
  MAX: 0.95,
} as const;

export const MAX_ALTERNATIVE_CATEGORIES = 3;

// ============================================
// RISK AUDIT
// ============================================

/** Stricter than LOW_FIELD_CONFIDENCE: proactive audit, not an ingestion gate */
export const AUDIT_CONFIDENCE = 0.9;

export const LARGE_TRANSACTION_MULTIPLIER = 2;

export const CATEGORY_SHIFT_PERCENT = 25;

export const SUBSCRIPTION_MIN_OCCURRENCES = 3;

/** Mean interval window (days) that reads as a monthly charge */
export const SUBSCRIPTION_INTERVAL_DAYS = { min: 25, max: 35 } as const;

export const DEPLETION_HORIZON_DAYS = 90;

export const FIRST_TIME_VENDOR_MULTIPLIER = 1.5;

export const WEEKEND_SPIKE_MULTIPLIER = 1.5;

export const TAX_DEDUCTIBLE_MIN_AMOUNT = 100;

export const TAX_DEDUCTIBLE_CATEGORIES: readonly string[] = [
  'business',
  'medical',
  'charity',
  'education',
  'home office',
  'home_office',
];

// ============================================
// DEFAULTS FOR CANDIDATE NORMALIZATION
// ============================================

export const DEFAULT_CURRENCY = 'PKR';

/** Field confidence when the extractor supplied none */
export const DEFAULT_FIELD_CONFIDENCE = 0.5;

/** Cap applied to a field that had to be substituted or could not be parsed */
export const SUBSTITUTED_FIELD_CONFIDENCE = 0.3;
