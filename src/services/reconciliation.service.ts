/**
 * Reconciliation Service
 *
 * Orchestrates the engine for the HTTP layer:
 * - Normalizing and checking a freshly extracted candidate
 * - Confidence analysis of a single record
 * - Duplicate search and batch duplicate checks
 * - Dashboard summary of a record set
 *
 * Stateless: callers send the snapshot to work on and persist the
 * annotated output themselves.
 */

import { categorizer, engineConfig } from '../config';
import {
  analyzeConfidence,
  batchCheck,
  findDuplicates,
  getConfidenceLevel,
  getDuplicateSummary,
  markAsDuplicate,
  normalizeCandidate,
  summarizeLedger,
} from '../reconciliation';
import { Logging } from '../utils';
import type {
  ConfidenceAnalysis,
  ConfidenceLevel,
  ConfidenceSubject,
  DuplicateMatch,
  LedgerSummary,
  RawCandidate,
  RecordId,
  TransactionLike,
  TransactionRecord,
} from '../reconciliation';

// ============================================
// Types
// ============================================

export interface CandidateReconciliation {
  /** Normalized record with needsReview and duplicate markers applied */
  record: TransactionRecord;
  analysis: ConfidenceAnalysis;
  confidenceLevel: ConfidenceLevel;
  duplicates: DuplicateMatch<TransactionRecord>[];
  duplicateSummary: string;
}

export interface BatchDuplicateEntry {
  id: RecordId;
  matches: DuplicateMatch[];
}

// ============================================
// Candidate pipeline
// ============================================

/**
 * Runs a candidate through normalize → confidence → duplicates → marking.
 *
 * @param raw - Candidate as produced by field extraction
 * @param existing - Snapshot of persisted records to compare against
 */
export function reconcileCandidate(
  raw: RawCandidate,
  existing: readonly TransactionRecord[],
  now: Date = new Date()
): CandidateReconciliation {
  const normalized = normalizeCandidate(raw, { categorizer, config: engineConfig, now });
  const analysis = analyzeConfidence(normalized, { config: engineConfig, now });
  const duplicates = findDuplicates(normalized, existing, { config: engineConfig });

  const record = markAsDuplicate({ ...normalized, needsReview: analysis.needsReview }, duplicates);

  Logging.info(
    `Candidate "${record.vendor}" reconciled: category=${record.category}, ` +
      `confidence=${analysis.overallConfidence}, needsReview=${record.needsReview}, ` +
      `duplicates=${duplicates.length}${record.isDuplicate ? ` (of #${String(record.duplicateOf)})` : ''}`
  );

  if (analysis.flags.length > 0) {
    Logging.debug({ vendor: record.vendor, flags: analysis.flags });
  }

  return {
    record,
    analysis,
    confidenceLevel: getConfidenceLevel(analysis.overallConfidence),
    duplicates,
    duplicateSummary: getDuplicateSummary(duplicates),
  };
}

// ============================================
// Single operations
// ============================================

export function checkConfidence(
  record: ConfidenceSubject,
  now: Date = new Date()
): ConfidenceAnalysis & { confidenceLevel: ConfidenceLevel } {
  const analysis = analyzeConfidence(record, { config: engineConfig, now });
  return { ...analysis, confidenceLevel: getConfidenceLevel(analysis.overallConfidence) };
}

export function searchDuplicates(
  candidate: TransactionLike,
  existing: readonly TransactionLike[],
  threshold?: number
): DuplicateMatch[] {
  const matches = findDuplicates(candidate, existing, { threshold, config: engineConfig });
  Logging.debug(`Duplicate search over ${existing.length} records: ${matches.length} match(es)`);
  return matches;
}

/**
 * Batch duplicate check, flattened for JSON (ids in input order).
 */
export function checkBatchDuplicates(
  records: readonly TransactionLike[],
  threshold?: number
): BatchDuplicateEntry[] {
  const results = batchCheck(records, { threshold, config: engineConfig });
  const entries = [...results.entries()].map(([id, matches]) => ({ id, matches }));

  Logging.info(`Batch duplicate check: ${records.length} records, ${entries.length} with matches`);

  return entries;
}

export function summarize(records: readonly TransactionRecord[]): LedgerSummary {
  return summarizeLedger(records);
}

export const reconciliationService = {
  reconcileCandidate,
  checkConfidence,
  searchDuplicates,
  checkBatchDuplicates,
  summarize,
};

export default reconciliationService;
