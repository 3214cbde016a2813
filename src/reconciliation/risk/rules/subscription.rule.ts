/**
 * Recurring subscription.
 *
 * Records are grouped by case-folded vendor and exact amount. A group
 * with at least `subscriptionMinOccurrences` dated records whose mean gap
 * falls inside `subscriptionIntervalDays` reads as a monthly charge.
 */

import { normalizeVendor } from '../../normalizeVendor';
import { dayDifference } from '../../dateNormalizer';
import { round2, toCents } from '../../rounding';
import { amountOf, idsOf, mean, withDates } from '../helpers';
import type { TransactionRecord } from '../../types';
import type { DatedRecord } from '../helpers';
import type { RiskAlert, RiskRule } from '../types';

export const subscriptionRule: RiskRule = {
  type: 'subscription_detected',

  evaluate(records, { config }) {
    const groups = new Map<string, DatedRecord<TransactionRecord>[]>();

    for (const dated of withDates(records, config.dateOrder)) {
      const vendor = normalizeVendor(dated.record.vendor);
      const amount = amountOf(dated.record);
      if (!vendor || amount === 0) continue;

      const key = `${vendor}|${toCents(amount)}`;
      const group = groups.get(key) ?? [];
      group.push(dated);
      groups.set(key, group);
    }

    const alerts: RiskAlert[] = [];
    const { min, max } = config.subscriptionIntervalDays;

    for (const group of groups.values()) {
      if (group.length < config.subscriptionMinOccurrences) continue;

      const ordered = [...group].sort((a, b) => a.date.getTime() - b.date.getTime());
      const intervals: number[] = [];
      for (let i = 1; i < ordered.length; i++) {
        const previous = ordered[i - 1];
        const current = ordered[i];
        if (previous && current) {
          intervals.push(dayDifference(previous.date, current.date));
        }
      }
      const averageInterval = mean(intervals);

      if (averageInterval < min || averageInterval > max) continue;

      const first = ordered[0];
      if (!first) continue;

      const amount = amountOf(first.record);

      alerts.push({
        severity: 'low',
        type: 'subscription_detected',
        message: `Potential monthly subscription detected for ${first.record.vendor.trim()} with amount ${amount}`,
        transactionIds: idsOf(ordered.map((entry) => entry.record)),
        recommendedAction: 'Confirm if this is a subscription and categorize accordingly',
        evidence: {
          occurrences: ordered.length,
          averageIntervalDays: round2(averageInterval),
          amount,
        },
      });
    }

    return alerts;
  },
};

export default subscriptionRule;
