/**
 * Sudden category spend shift.
 *
 * Spend is summed per (month, category). For each pair of adjacent
 * months that have data, a category present in both is flagged when its
 * spend moved by more than `categoryShiftPercent` in either direction.
 * The alert carries the later month's transactions for that category.
 */

import { amountOf, formatMoney, idsOf, monthKey, withDates } from '../helpers';
import { round2 } from '../../rounding';
import type { TransactionRecord } from '../../types';
import type { DatedRecord } from '../helpers';
import type { RiskAlert, RiskRule } from '../types';

interface CategorySpend {
  total: number;
  records: TransactionRecord[];
}

type MonthlySpend = Map<string, Map<string, CategorySpend>>;

function groupByMonth(dated: readonly DatedRecord<TransactionRecord>[]): MonthlySpend {
  const months: MonthlySpend = new Map();

  for (const { record, date } of dated) {
    const month = monthKey(date);
    const categories = months.get(month) ?? new Map<string, CategorySpend>();
    const category = record.category.trim();
    const spend = categories.get(category) ?? { total: 0, records: [] };

    spend.total += amountOf(record);
    spend.records.push(record);
    categories.set(category, spend);
    months.set(month, categories);
  }

  return months;
}

export const categoryShiftRule: RiskRule = {
  type: 'sudden_category_change',

  evaluate(records, { config }) {
    const months = groupByMonth(withDates(records, config.dateOrder));
    const keys = [...months.keys()].sort();
    const alerts: RiskAlert[] = [];

    for (let i = 1; i < keys.length; i++) {
      const previousMonth = months.get(keys[i - 1] ?? '');
      const currentKey = keys[i] ?? '';
      const currentMonth = months.get(currentKey);
      if (!previousMonth || !currentMonth) continue;

      for (const [category, current] of currentMonth) {
        const previous = previousMonth.get(category);
        if (!previous || previous.total <= 0) continue;

        const changePercent = ((current.total - previous.total) / previous.total) * 100;
        if (Math.abs(changePercent) <= config.categoryShiftPercent) continue;

        alerts.push({
          severity: 'medium',
          type: 'sudden_category_change',
          message:
            `Sudden ${changePercent.toFixed(1)}% change in ${category} spending ` +
            `from ${formatMoney(previous.total)} to ${formatMoney(current.total)} in ${currentKey}`,
          transactionIds: idsOf(current.records),
          recommendedAction: 'Investigate the reason for the spending change',
          evidence: {
            category,
            month: currentKey,
            previousTotal: round2(previous.total),
            currentTotal: round2(current.total),
            changePercent: round2(changePercent),
          },
        });
      }
    }

    return alerts;
  },
};

export default categoryShiftRule;
