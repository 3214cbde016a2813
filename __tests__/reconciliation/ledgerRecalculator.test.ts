/**
 * Tests for Ledger Recalculation
 */

import { recalculateLedger, sortChronologically } from '../../src/reconciliation/ledgerRecalculator';
import { NOW, createIncomeRecord, createTestRecord } from '../fixtures/records';

describe('recalculateLedger', () => {
  const rent = createTestRecord({ id: 1, date: '2024-01-01', vendor: 'Landlord', expense: 200 });
  const salary = createIncomeRecord({ id: 2, date: '2024-01-02', income: 500 });

  it('should compute running balances in date order', () => {
    const result = recalculateLedger(1000, [salary, rent], { now: NOW });

    expect(result.entries).toEqual([
      { id: 1, runningBalance: 800 },
      { id: 2, runningBalance: 1300 },
    ]);
    expect(result.records.map((record) => record.remainingBalance)).toEqual([800, 1300]);
  });

  it('should compute totals and the balance', () => {
    const result = recalculateLedger(1000, [rent, salary], { now: NOW });

    expect(result.totals).toEqual({ income: 500, expense: 200, current: 1300 });
    expect(result.balance).toEqual({
      openingBalance: 1000,
      currentBalance: 1300,
      totalIncome: 500,
      totalExpense: 200,
      lastUpdated: NOW.toISOString(),
    });
  });

  it('should not modify the input records', () => {
    recalculateLedger(1000, [rent, salary], { now: NOW });

    expect(rent.remainingBalance).toBe(0);
    expect(salary.remainingBalance).toBe(0);
  });

  it('should be idempotent', () => {
    const first = recalculateLedger(1000, [rent, salary], { now: NOW });
    const second = recalculateLedger(1000, first.records, { now: NOW });

    expect(second.entries).toEqual(first.entries);
    expect(second.records).toEqual(first.records);
  });

  it('should return the opening balance for an empty ledger', () => {
    const result = recalculateLedger(250, [], { now: NOW });

    expect(result.entries).toEqual([]);
    expect(result.totals).toEqual({ income: 0, expense: 0, current: 250 });
  });

  it('should accumulate without floating point drift', () => {
    const coffees = [1, 2, 3].map((id) => createTestRecord({ id, date: '2024-01-05', expense: 0.1 }));

    const result = recalculateLedger(0, coffees, { now: NOW });

    expect(result.totals.current).toBe(-0.3);
    expect(result.totals.expense).toBe(0.3);
  });

  it('should count amounts too large to scale as 0 and flag their records', () => {
    const records = [
      createIncomeRecord({ id: 1, date: '2024-01-01', income: 1.7e308 }),
      createTestRecord({ id: 2, date: '2024-01-02', expense: 1.7e308 }),
    ];

    const result = recalculateLedger(0, records, { now: NOW });

    expect(result.entries).toEqual([
      { id: 1, runningBalance: 0 },
      { id: 2, runningBalance: 0 },
    ]);
    expect(result.records.map((record) => record.needsReview)).toEqual([true, true]);
    expect(result.totals).toEqual({ income: 0, expense: 0, current: 0 });
  });

  it('should keep totals exact beyond the safe integer range of cents', () => {
    const records = [
      createIncomeRecord({ id: 1, date: '2024-01-01', income: 90_000_000_000_000 }),
      createIncomeRecord({ id: 2, date: '2024-01-02', income: 90_000_000_000_000 }),
    ];

    const result = recalculateLedger(0, records, { now: NOW });

    expect(result.totals).toEqual({ income: 180_000_000_000_000, expense: 0, current: 180_000_000_000_000 });
    expect(result.records.map((record) => record.needsReview)).toEqual([false, false]);
  });

  it('should include records with unparseable dates in the totals', () => {
    const undated = createIncomeRecord({ id: 3, date: 'unknown', income: 50 });

    const result = recalculateLedger(1000, [undated, rent, salary], { now: NOW });

    expect(result.entries.map((entry) => entry.id)).toEqual([1, 2, 3]);
    expect(result.totals).toEqual({ income: 550, expense: 200, current: 1350 });
  });

  it('should allow a negative running balance', () => {
    const result = recalculateLedger(100, [rent], { now: NOW });

    expect(result.entries).toEqual([{ id: 1, runningBalance: -100 }]);
  });
});

describe('sortChronologically', () => {
  it('should break same-day ties by id', () => {
    const records = [
      createTestRecord({ id: 5, date: '2024-01-01' }),
      createTestRecord({ id: 2, date: '2024-01-01' }),
    ];

    expect(sortChronologically(records).map((record) => record.id)).toEqual([2, 5]);
  });

  it('should compare dates written in different formats', () => {
    const records = [
      createTestRecord({ id: 1, date: '03/01/2024' }),
      createTestRecord({ id: 2, date: '2024-01-02' }),
    ];

    expect(sortChronologically(records).map((record) => record.id)).toEqual([2, 1]);
  });

  it('should put unparseable dates last', () => {
    const records = [
      createTestRecord({ id: 1, date: 'unknown' }),
      createTestRecord({ id: 3, date: '2024-02-01' }),
      createTestRecord({ id: 2, date: '2024-01-01' }),
    ];

    expect(sortChronologically(records).map((record) => record.id)).toEqual([2, 3, 1]);
  });

  it('should order numeric ids before string ids', () => {
    const records = [
      createTestRecord({ id: 'rec-b', date: '2024-01-01' }),
      createTestRecord({ id: 'rec-a', date: '2024-01-01' }),
      createTestRecord({ id: 9, date: '2024-01-01' }),
    ];

    expect(sortChronologically(records).map((record) => record.id)).toEqual([9, 'rec-a', 'rec-b']);
  });
});
