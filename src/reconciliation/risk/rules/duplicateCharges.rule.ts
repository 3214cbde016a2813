/**
 * Duplicate charges: the same purchase booked more than once.
 *
 * Uses the duplicate detector at the stricter audit threshold. Once a
 * cluster is reported its members are skipped, so one cluster yields
 * one alert.
 */

import { findDuplicates } from '../../duplicateDetector';
import { isRecordId } from '../../recordIds';
import { amountOf, idsOf } from '../helpers';
import type { RecordId } from '../../types';
import type { RiskAlert, RiskRule } from '../types';

export const duplicateChargesRule: RiskRule = {
  type: 'duplicate_charges',

  evaluate(records, { config }) {
    const alerts: RiskAlert[] = [];
    const processed = new Set<RecordId>();

    records.forEach((record, index) => {
      if (isRecordId(record.id) && processed.has(record.id)) {
        return;
      }

      const others = records.filter((_, otherIndex) => otherIndex !== index);
      const matches = findDuplicates(record, others, {
        threshold: config.riskDuplicateThreshold,
        config,
      });

      if (matches.length === 0) {
        return;
      }

      const transactionIds = [...idsOf(matches.map((match) => match.matchedRecord)), ...idsOf([record])];
      transactionIds.forEach((id) => processed.add(id));

      alerts.push({
        severity: 'medium',
        type: 'duplicate_charges',
        message: `Potential duplicate transactions detected for ${record.vendor} with amount ${amountOf(record)}`,
        transactionIds,
        recommendedAction: 'Review and merge duplicate transactions',
        evidence: {
          highestScore: matches[0]?.score ?? 0,
          threshold: config.riskDuplicateThreshold,
        },
      });
    });

    return alerts;
  },
};

export default duplicateChargesRule;
