/**
 * Weekend spending spike: mean weekend amount above
 * `weekendSpikeMultiplier` times the mean weekday amount.
 * Only evaluated when both groups have records.
 */

import { amountOf, formatMoney, idsOf, isWeekend, mean, withDates } from '../helpers';
import type { RiskRule } from '../types';

export const weekendSpikeRule: RiskRule = {
  type: 'weekend_spending_spike',

  evaluate(records, { config }) {
    const dated = withDates(records, config.dateOrder);
    const weekend = dated.filter(({ date }) => isWeekend(date)).map(({ record }) => record);
    const weekday = dated.filter(({ date }) => !isWeekend(date)).map(({ record }) => record);

    if (weekend.length === 0 || weekday.length === 0) {
      return [];
    }

    const weekendAverage = mean(weekend.map(amountOf));
    const weekdayAverage = mean(weekday.map(amountOf));

    if (weekendAverage <= weekdayAverage * config.weekendSpikeMultiplier) {
      return [];
    }

    return [
      {
        severity: 'low',
        type: 'weekend_spending_spike',
        message:
          `Unusual spending spike on weekends: ${formatMoney(weekendAverage)} ` +
          `vs weekday average ${formatMoney(weekdayAverage)}`,
        transactionIds: idsOf(weekend),
        recommendedAction: 'Review weekend transactions for unusual activity',
        evidence: {
          weekendAverage: Number(formatMoney(weekendAverage)),
          weekdayAverage: Number(formatMoney(weekdayAverage)),
          weekendCount: weekend.length,
          weekdayCount: weekday.length,
        },
      },
    ];
  },
};

export default weekendSpikeRule;
