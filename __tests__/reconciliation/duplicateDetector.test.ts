/**
 * Tests for Duplicate Detection
 */

import {
  batchCheck,
  findDuplicates,
  getDuplicateSummary,
  markAsDuplicate,
  selectDuplicateOf,
} from '../../src/reconciliation/duplicateDetector';
import { createTestRecord } from '../fixtures/records';
import type { TransactionLike } from '../../src/reconciliation/types';

const candidate: TransactionLike = { date: '2024-01-10', vendor: 'KFC Johar', expense: 550 };

const statementLine: TransactionLike = { id: 7, date: '2024-01-10', vendor: 'KFC Johar Town', expense: 555 };
const unrelated: TransactionLike = { id: 3, date: '2024-02-01', vendor: 'Uber', expense: 1200 };

describe('findDuplicates', () => {
  it('should return matches at or above the default threshold', () => {
    const matches = findDuplicates(candidate, [statementLine, unrelated]);

    expect(matches).toHaveLength(1);
    expect(matches[0]?.matchedId).toBe(7);
    expect(matches[0]?.score).toBe(92.14);
    expect(matches[0]?.matchedRecord).toBe(statementLine);
    expect(matches[0]?.explanation).toBe('Amount: 100. Vendor: 92.86. Date: 100. Category: 0. Overall: 92.14');
  });

  it('should honor a custom threshold', () => {
    expect(findDuplicates(candidate, [statementLine], { threshold: 95 })).toEqual([]);
  });

  it('should sort by score, then by lowest id', () => {
    // Exact copies score 95: no category on either side
    const copyA: TransactionLike = { ...candidate, id: 9 };
    const copyB: TransactionLike = { ...candidate, id: 4 };

    const matches = findDuplicates(candidate, [statementLine, copyA, copyB]);

    expect(matches.map((match) => match.matchedId)).toEqual([4, 9, 7]);
  });

  it('should skip the candidate itself', () => {
    const saved: TransactionLike = { ...candidate, id: 4 };

    expect(findDuplicates(saved, [saved])).toEqual([]);
  });

  it('should return an empty list for an empty snapshot', () => {
    expect(findDuplicates(candidate, [])).toEqual([]);
  });
});

describe('batchCheck', () => {
  it('should map each identified record to its matches', () => {
    const records: TransactionLike[] = [
      { ...candidate, id: 1 },
      { ...statementLine, id: 2 },
      unrelated,
    ];

    const results = batchCheck(records);

    expect([...results.keys()]).toEqual([1, 2]);
    expect(results.get(1)?.[0]?.matchedId).toBe(2);
    expect(results.get(2)?.[0]?.matchedId).toBe(1);
  });

  it('should compare against unsaved records without giving them an entry', () => {
    const results = batchCheck([{ ...candidate, id: 1 }, { ...candidate }]);

    expect(results.size).toBe(1);
    expect(results.get(1)?.[0]?.matchedId).toBeNull();
  });
});

describe('selectDuplicateOf', () => {
  it('should return null without matches', () => {
    expect(selectDuplicateOf([])).toBeNull();
  });

  it('should pick the lowest id among equal scores', () => {
    const matches = findDuplicates(candidate, [
      { ...candidate, id: 12 },
      { ...candidate, id: 5 },
    ]);

    expect(selectDuplicateOf(matches)?.matchedId).toBe(5);
  });
});

describe('markAsDuplicate', () => {
  it('should flag a copy of the record with the best match', () => {
    const record = createTestRecord({ id: 10, vendor: 'KFC Johar', expense: 550, date: '2024-01-10' });
    const matches = findDuplicates(record, [statementLine]);

    const marked = markAsDuplicate(record, matches);

    expect(marked).toEqual({ ...record, isDuplicate: true, duplicateOf: 7 });
    expect(record.isDuplicate).toBe(false);
  });

  it('should leave the record unchanged when matches have no id', () => {
    const record = createTestRecord({ id: 10, vendor: 'KFC Johar', expense: 550, date: '2024-01-10' });
    const matches = findDuplicates(record, [{ ...candidate }]);

    expect(markAsDuplicate(record, matches)).toBe(record);
  });

  it('should ignore a match pointing at the record itself', () => {
    const record = createTestRecord({ id: 7 });
    const matches = findDuplicates(candidate, [statementLine]);

    expect(markAsDuplicate(record, matches)).toBe(record);
  });
});

describe('getDuplicateSummary', () => {
  it('should report no duplicates', () => {
    expect(getDuplicateSummary([])).toBe('No duplicates found.');
  });

  it('should list the strongest matches', () => {
    const matches = findDuplicates(candidate, [statementLine]);

    expect(getDuplicateSummary(matches)).toBe(
      'Found 1 possible duplicate:\n1. #7 KFC Johar Town on 2024-01-10 (92.14% similar)'
    );
  });

  it('should show at most three matches and count every match', () => {
    const matches = findDuplicates(candidate, [
      { ...candidate },
      { ...candidate, id: 2 },
      { ...candidate, id: 3 },
      { ...candidate, id: 4 },
    ]);

    const lines = getDuplicateSummary(matches).split('\n');

    expect(lines[0]).toBe('Found 4 possible duplicates:');
    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe('1. #2 KFC Johar on 2024-01-10 (95% similar)');
    expect(lines[3]).toBe('3. #4 KFC Johar on 2024-01-10 (95% similar)');
  });
});
