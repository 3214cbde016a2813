/**
 * First-time high-value vendor: a vendor seen exactly once whose single
 * transaction exceeds `firstTimeVendorMultiplier` times the mean amount
 * of all transactions.
 */

import { normalizeVendor } from '../../normalizeVendor';
import { amountOf, formatMoney, idsOf, mean } from '../helpers';
import type { TransactionRecord } from '../../types';
import type { RiskAlert, RiskRule } from '../types';

export const firstTimeVendorRule: RiskRule = {
  type: 'first_time_high_value_vendor',

  evaluate(records, { config }) {
    if (records.length === 0) {
      return [];
    }

    const byVendor = new Map<string, TransactionRecord[]>();
    for (const record of records) {
      const vendor = normalizeVendor(record.vendor);
      if (!vendor) continue;

      const seen = byVendor.get(vendor) ?? [];
      seen.push(record);
      byVendor.set(vendor, seen);
    }

    const average = mean(records.map(amountOf));
    const threshold = average * config.firstTimeVendorMultiplier;
    const alerts: RiskAlert[] = [];

    for (const seen of byVendor.values()) {
      const [only] = seen;
      if (seen.length !== 1 || !only) continue;

      const amount = amountOf(only);
      if (amount <= threshold) continue;

      alerts.push({
        severity: 'medium',
        type: 'first_time_high_value_vendor',
        message: `First-time vendor ${only.vendor.trim()} with high value transaction of ${amount}`,
        transactionIds: idsOf([only]),
        recommendedAction: 'Verify the legitimacy of this new vendor transaction',
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

export default firstTimeVendorRule;
