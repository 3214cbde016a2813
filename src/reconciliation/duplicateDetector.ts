/**
 * Duplicate Detector
 *
 * Finds existing records that look like the same real-world transaction
 * as a candidate. Uses the similarity scorer for every pair.
 *
 * Flow:
 * 1. Score the candidate against each existing record (its own id is skipped)
 * 2. Keep matches at or above the threshold
 * 3. Sort by score descending, then by lowest matched id
 *
 * A candidate is marked as a duplicate of exactly one record: the
 * first match after sorting.
 */

import { DEFAULT_CONFIG } from './config';
import { compareRecordIds, isRecordId } from './recordIds';
import { explainSimilarity, scoreSimilarity } from './similarityScorer';
import type { ReconciliationConfig } from './config';
import type { DuplicateMatch, RecordId, TransactionLike } from './types';

export interface DuplicateOptions {
  /** Minimum overall score (0-100); defaults to config.duplicateThreshold */
  threshold?: number;
  config?: ReconciliationConfig;
}

const SUMMARY_LIMIT = 3;

function compareMatches(a: DuplicateMatch, b: DuplicateMatch): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }

  return compareRecordIds(a.matchedId, b.matchedId);
}

/**
 * Finds likely duplicates of `candidate` among `existing`.
 *
 * @returns Matches sorted best first; empty when nothing reaches the threshold
 *
 * @example
 * findDuplicates(
 *   { vendor: 'KFC Johar', expense: 550, date: '2024-01-10' },
 *   [{ id: 7, vendor: 'KFC Johar Town', expense: 555, date: '2024-01-10' }]
 * )
 * // [{ matchedId: 7, score: 92.14, ... }]
 */
export function findDuplicates<T extends TransactionLike>(
  candidate: TransactionLike,
  existing: readonly T[],
  options: DuplicateOptions = {}
): DuplicateMatch<T>[] {
  const config = options.config ?? DEFAULT_CONFIG;
  const threshold = options.threshold ?? config.duplicateThreshold;
  const ownId = candidate.id;

  const matches: DuplicateMatch<T>[] = [];

  for (const record of existing) {
    if (isRecordId(ownId) && record.id === ownId) {
      continue;
    }

    const similarity = scoreSimilarity(candidate, record, config);
    if (similarity.overall < threshold) {
      continue;
    }

    matches.push({
      matchedId: record.id ?? null,
      matchedRecord: record,
      score: similarity.overall,
      breakdown: similarity.breakdown,
      explanation: explainSimilarity(similarity),
    });
  }

  return matches.sort(compareMatches);
}

/**
 * Checks every identified record against every other one.
 * Records without an id are compared against but get no entry of their own.
 *
 * @returns Map from record id to its matches (only ids with at least one match)
 */
export function batchCheck<T extends TransactionLike>(
  records: readonly T[],
  options: DuplicateOptions = {}
): Map<RecordId, DuplicateMatch<T>[]> {
  const results = new Map<RecordId, DuplicateMatch<T>[]>();

  records.forEach((record, index) => {
    const id = record.id;
    if (!isRecordId(id)) {
      return;
    }

    const others = records.filter((_, otherIndex) => otherIndex !== index);
    const matches = findDuplicates(record, others, options);

    if (matches.length > 0) {
      results.set(id, matches);
    }
  });

  return results;
}

/**
 * The single record a candidate should point at: highest score,
 * ties broken by the lowest id.
 */
export function selectDuplicateOf<T extends TransactionLike>(
  matches: readonly DuplicateMatch<T>[]
): DuplicateMatch<T> | null {
  if (matches.length === 0) {
    return null;
  }

  return [...matches].sort(compareMatches)[0] ?? null;
}

/**
 * Returns a copy of `record` flagged as a duplicate of the best match.
 * A match pointing at the record itself, or at nothing, is ignored.
 */
export function markAsDuplicate<R extends { id: RecordId | null; isDuplicate: boolean; duplicateOf: RecordId | null }>(
  record: R,
  matches: readonly DuplicateMatch[]
): R {
  const eligible = matches.filter(
    (match) => isRecordId(match.matchedId) && match.matchedId !== record.id
  );
  const best = selectDuplicateOf(eligible);

  if (!best || !isRecordId(best.matchedId)) {
    return record;
  }

  return {
    ...record,
    isDuplicate: true,
    duplicateOf: best.matchedId,
  };
}

/**
 * One-paragraph summary of the strongest matches for review screens.
 */
export function getDuplicateSummary(matches: readonly DuplicateMatch[]): string {
  if (matches.length === 0) {
    return 'No duplicates found.';
  }

  const top = [...matches].sort(compareMatches).slice(0, SUMMARY_LIMIT);
  const lines = top.map((match, index) => {
    const record = match.matchedRecord;
    const label = record.vendor ?? record.merchant ?? record.description ?? 'Unknown vendor';
    const id = isRecordId(match.matchedId) ? `#${match.matchedId}` : '(unsaved)';
    return `${index + 1}. ${id} ${label} on ${record.date ?? 'unknown date'} (${match.score}% similar)`;
  });

  const noun = matches.length === 1 ? 'possible duplicate' : 'possible duplicates';
  return [`Found ${matches.length} ${noun}:`, ...lines].join('\n');
}

export default findDuplicates;
