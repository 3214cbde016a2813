import {
  checkBatchDuplicates,
  checkConfidence,
  reconcileCandidate,
  searchDuplicates,
  summarize,
} from '../../src/services/reconciliation.service';
import { NOW, createTestRecord } from '../fixtures/records';

describe('ReconciliationService', () => {
  const persisted = createTestRecord({
    id: 7,
    date: '2024-06-14',
    vendor: 'KFC Johar Town',
    expense: 555,
    category: 'Food',
  });

  describe('reconcileCandidate', () => {
    it('should normalize, analyze and mark a duplicate candidate', () => {
      const result = reconcileCandidate(
        {
          date: '14/06/2024',
          vendor: 'KFC Johar',
          amount: 550,
          confidence: { vendor: 0.9, amount: 0.9, date: 0.9, category: 0.9 },
        },
        [persisted],
        NOW
      );

      expect(result.record.date).toBe('2024-06-14');
      expect(result.record.category).toBe('Food');
      expect(result.record.expense).toBe(550);
      expect(result.record.isDuplicate).toBe(true);
      expect(result.record.duplicateOf).toBe(7);
      expect(result.record.needsReview).toBe(false);
      expect(result.analysis.flags).toEqual([]);
      expect(result.confidenceLevel).toBe('Medium');
      // 100 × 0.4 + 92.86 × 0.4 + 100 × 0.15 + 100 × 0.05
      expect(result.duplicates[0]?.score).toBe(97.14);
      expect(result.duplicateSummary).toBe(
        'Found 1 possible duplicate:\n1. #7 KFC Johar Town on 2024-06-14 (97.14% similar)'
      );
    });

    it('should send an incomplete candidate to review', () => {
      const result = reconcileCandidate({ vendor: 'Careem' }, [], NOW);

      expect(result.record.needsReview).toBe(true);
      expect(result.record.isDuplicate).toBe(false);
      expect(result.analysis.flags).toEqual(['Amount is zero or missing']);
      expect(result.duplicateSummary).toBe('No duplicates found.');
    });
  });

  describe('checkConfidence', () => {
    it('should add a confidence level to the analysis', () => {
      const result = checkConfidence({ date: '2024-06-10', vendor: 'Unknown', amount: 0 }, NOW);

      expect(result.flags).toEqual(['Amount is zero or missing', 'Vendor name is unknown or missing']);
      expect(result.confidenceLevel).toBe('Very Low');
    });
  });

  describe('searchDuplicates', () => {
    it('should apply the given threshold', () => {
      const candidate = { date: '2024-06-14', vendor: 'KFC Johar', expense: 550, category: 'Food' };

      expect(searchDuplicates(candidate, [persisted])).toHaveLength(1);
      expect(searchDuplicates(candidate, [persisted], 99)).toEqual([]);
    });
  });

  describe('checkBatchDuplicates', () => {
    it('should flatten matches per record id', () => {
      const copy = { ...persisted, id: 8 };

      const results = checkBatchDuplicates([persisted, copy]);

      expect(results.map((entry) => entry.id)).toEqual([7, 8]);
      expect(results[0]?.matches[0]?.matchedId).toBe(8);
    });
  });

  describe('summarize', () => {
    it('should summarize the record set', () => {
      expect(summarize([persisted]).totalExpense).toBe(555);
    });
  });
});
