import { analyzeRisks } from '../../src/services/risk.service';
import { Logging } from '../../src/utils';
import { NOW, createTestRecord } from '../fixtures/records';

describe('RiskService', () => {
  describe('analyzeRisks', () => {
    it('should run every default rule', () => {
      const records = [
        createTestRecord({ id: 1, vendor: 'City Hospital', category: 'Medical', expense: 2500 }),
        createTestRecord({ id: 2, vendor: 'City Hospital', category: 'Medical', expense: 2500 }),
      ];

      const result = analyzeRisks(records, NOW);

      expect(result.noAlerts).toBe(false);
      expect(result.alerts.map((alert) => alert.type)).toEqual([
        'duplicate_charges',
        'potential_tax_deductible',
        'potential_tax_deductible',
      ]);
    });

    it('should warn about high-severity alerts', () => {
      const warn = jest.spyOn(Logging, 'warn').mockImplementation(() => undefined);
      const records = [
        createTestRecord({ id: 1, vendor: 'Bakery', date: '2024-06-03', expense: 100 }),
        createTestRecord({ id: 2, vendor: 'Pharmacy', date: '2024-06-04', expense: 100 }),
        createTestRecord({ id: 3, vendor: 'Bookshop', date: '2024-06-05', expense: 100 }),
        createTestRecord({ id: 4, vendor: 'Furniture Mart', date: '2024-06-06', expense: 1000 }),
      ];

      analyzeRisks(records, NOW);

      expect(warn).toHaveBeenCalledWith(expect.stringContaining('unusually_large_transaction'));
      warn.mockRestore();
    });

    it('should not warn when every alert is medium or low', () => {
      const warn = jest.spyOn(Logging, 'warn').mockImplementation(() => undefined);
      const records = [
        createTestRecord({ id: 1, vendor: 'City Hospital', category: 'Medical', expense: 2500 }),
        createTestRecord({ id: 2, vendor: 'City Hospital', category: 'Medical', expense: 2500 }),
      ];

      analyzeRisks(records, NOW);

      expect(warn).not.toHaveBeenCalled();
      warn.mockRestore();
    });

    it('should report an empty ledger as clean', () => {
      expect(analyzeRisks([], NOW)).toEqual({ alerts: [], noAlerts: true });
    });
  });
});
