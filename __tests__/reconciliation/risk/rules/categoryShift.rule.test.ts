import { categoryShiftRule } from '../../../../src/reconciliation/risk/rules/categoryShift.rule';
import { DEFAULT_CONFIG } from '../../../../src/reconciliation/config';
import { NOW, createTestRecord } from '../../../fixtures/records';

const context = { config: DEFAULT_CONFIG, now: NOW };

describe('categoryShiftRule', () => {
  it('should flag a category whose spend jumps between adjacent months', () => {
    const records = [
      createTestRecord({ id: 1, date: '2024-01-15', category: 'Food', expense: 100 }),
      createTestRecord({ id: 2, date: '2024-02-03', category: 'Food', expense: 120 }),
      createTestRecord({ id: 3, date: '2024-02-20', category: 'Food', expense: 80 }),
    ];

    expect(categoryShiftRule.evaluate(records, context)).toEqual([
      {
        severity: 'medium',
        type: 'sudden_category_change',
        message: 'Sudden 100.0% change in Food spending from 100.00 to 200.00 in 2024-02',
        transactionIds: [2, 3],
        recommendedAction: 'Investigate the reason for the spending change',
        evidence: {
          category: 'Food',
          month: '2024-02',
          previousTotal: 100,
          currentTotal: 200,
          changePercent: 100,
        },
      },
    ]);
  });

  it('should flag a drop as well as a rise', () => {
    const records = [
      createTestRecord({ id: 1, date: '2024-01-15', category: 'Fuel', expense: 200 }),
      createTestRecord({ id: 2, date: '2024-02-15', category: 'Fuel', expense: 100 }),
    ];

    expect(categoryShiftRule.evaluate(records, context)[0]?.message).toBe(
      'Sudden -50.0% change in Fuel spending from 200.00 to 100.00 in 2024-02'
    );
  });

  it('should ignore changes within the threshold', () => {
    const records = [
      createTestRecord({ id: 1, date: '2024-01-15', category: 'Food', expense: 100 }),
      createTestRecord({ id: 2, date: '2024-02-15', category: 'Food', expense: 110 }),
    ];

    expect(categoryShiftRule.evaluate(records, context)).toEqual([]);
  });

  it('should ignore categories new in the later month', () => {
    const records = [
      createTestRecord({ id: 1, date: '2024-01-15', category: 'Food', expense: 100 }),
      createTestRecord({ id: 2, date: '2024-02-15', category: 'Rent', expense: 5000 }),
    ];

    expect(categoryShiftRule.evaluate(records, context)).toEqual([]);
  });
});
