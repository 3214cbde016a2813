/**
 * Projected balance depletion.
 *
 * Starts from the running balance of the chronologically first record
 * and replays only future-dated records on top of it (expenses
 * subtract, income adds). If the projection goes negative within
 * `depletionHorizonDays` of today, one alert reports how many days
 * remain. The alert names no transactions: it is about the future as a whole.
 */

import { dayDifference, startOfDay, toIsoDate } from '../../dateNormalizer';
import { sortChronologically } from '../../ledgerRecalculator';
import { fromCents, toCents } from '../../rounding';
import { amountOf, withDates } from '../helpers';
import type { RiskRule } from '../types';

export const balanceDepletionRule: RiskRule = {
  type: 'projected_balance_risk',

  evaluate(records, { config, now }) {
    const ordered = sortChronologically(records, config.dateOrder);
    const earliest = ordered[0];
    if (!earliest) {
      return [];
    }

    const today = startOfDay(now);
    const upcoming = withDates(ordered, config.dateOrder).filter(({ date }) => date.getTime() > today.getTime());

    const startingCents = toCents(earliest.remainingBalance);
    let projectedCents = startingCents;

    for (const { record, date } of upcoming) {
      const amountCents = toCents(amountOf(record));
      projectedCents += record.transactionType === 'income' ? amountCents : -amountCents;

      if (projectedCents >= 0) {
        continue;
      }

      const days = dayDifference(today, date);
      if (days > config.depletionHorizonDays) {
        return [];
      }

      return [
        {
          severity: 'high',
          type: 'projected_balance_risk',
          message: `Projected cash depletion within ${days} days based on upcoming expenses`,
          transactionIds: [],
          recommendedAction: 'Review upcoming expenses and adjust budget',
          evidence: {
            startingBalance: fromCents(startingCents),
            projectedBalance: fromCents(projectedCents),
            daysUntilDepletion: days,
            depletionDate: toIsoDate(date),
          },
        },
      ];
    }

    return [];
  },
};

export default balanceDepletionRule;
