import { balanceDepletionRule } from '../../../../src/reconciliation/risk/rules/balanceDepletion.rule';
import { DEFAULT_CONFIG } from '../../../../src/reconciliation/config';
import { NOW, createIncomeRecord, createTestRecord } from '../../../fixtures/records';

const context = { config: DEFAULT_CONFIG, now: NOW };

describe('balanceDepletionRule', () => {
  const salary = createIncomeRecord({ id: 1, date: '2024-06-01', income: 1000, remainingBalance: 1000 });

  it('should project the first day the balance goes negative', () => {
    const records = [
      salary,
      createTestRecord({ id: 2, date: '2024-06-20', expense: 600 }),
      createTestRecord({ id: 3, date: '2024-07-01', expense: 600 }),
    ];

    expect(balanceDepletionRule.evaluate(records, context)).toEqual([
      {
        severity: 'high',
        type: 'projected_balance_risk',
        message: 'Projected cash depletion within 16 days based on upcoming expenses',
        transactionIds: [],
        recommendedAction: 'Review upcoming expenses and adjust budget',
        evidence: {
          startingBalance: 1000,
          projectedBalance: -200,
          daysUntilDepletion: 16,
          depletionDate: '2024-07-01',
        },
      },
    ]);
  });

  it('should count upcoming income', () => {
    const records = [
      salary,
      createIncomeRecord({ id: 2, date: '2024-06-20', income: 500 }),
      createTestRecord({ id: 3, date: '2024-07-01', expense: 1200 }),
    ];

    expect(balanceDepletionRule.evaluate(records, context)).toEqual([]);
  });

  it('should ignore depletion beyond the horizon', () => {
    const records = [salary, createTestRecord({ id: 2, date: '2024-12-01', expense: 5000 })];

    expect(balanceDepletionRule.evaluate(records, context)).toEqual([]);
  });

  it('should ignore past records', () => {
    const records = [salary, createTestRecord({ id: 2, date: '2024-06-10', expense: 5000 })];

    expect(balanceDepletionRule.evaluate(records, context)).toEqual([]);
  });
});
