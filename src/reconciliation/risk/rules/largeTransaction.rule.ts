/**
 * Unusually large transaction: more than `largeTransactionMultiplier`
 * times the mean of all positive amounts.
 */

import { amountOf, formatMoney, idsOf, mean } from '../helpers';
import type { RiskAlert, RiskRule } from '../types';

export const largeTransactionRule: RiskRule = {
  type: 'unusually_large_transaction',

  evaluate(records, { config }) {
    const amounts = records.map(amountOf).filter((amount) => amount > 0);
    if (amounts.length === 0) {
      return [];
    }

    const average = mean(amounts);
    const threshold = average * config.largeTransactionMultiplier;
    const alerts: RiskAlert[] = [];

    for (const record of records) {
      const amount = amountOf(record);
      if (amount <= threshold) {
        continue;
      }

      alerts.push({
        severity: 'high',
        type: 'unusually_large_transaction',
        message: `Transaction amount ${amount} is unusually large compared to the average of ${formatMoney(average)}`,
        transactionIds: idsOf([record]),
        recommendedAction: 'Verify the transaction details and source',
        evidence: {
          amount,
          average: Number(formatMoney(average)),
          threshold: Number(formatMoney(threshold)),
        },
      });
    }

    return alerts;
  },
};

export default largeTransactionRule;
