import { recalculate } from '../../src/services/ledger.service';
import { NOW, createIncomeRecord, createTestRecord } from '../fixtures/records';

describe('LedgerService', () => {
  describe('recalculate', () => {
    it('should recompute balances from the opening balance', () => {
      const result = recalculate(
        1000,
        [
          createIncomeRecord({ id: 2, date: '2024-01-02', income: 500 }),
          createTestRecord({ id: 1, date: '2024-01-01', expense: 200 }),
        ],
        NOW
      );

      expect(result.entries).toEqual([
        { id: 1, runningBalance: 800 },
        { id: 2, runningBalance: 1300 },
      ]);
      expect(result.balance.lastUpdated).toBe(NOW.toISOString());
    });
  });
});
