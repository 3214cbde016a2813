/**
 * Low-confidence fields: any confidence entry below the audit level.
 * Stricter than the ingestion check; this pass looks for records worth
 * a second look, not records to block.
 */

import { idsOf } from '../helpers';
import type { ConfidenceField } from '../../types';
import type { RiskAlert, RiskRule } from '../types';

const AUDITED_FIELDS: ConfidenceField[] = ['vendor', 'amount', 'date', 'category', 'transactionType'];

export const lowConfidenceRule: RiskRule = {
  type: 'low_confidence_fields',

  evaluate(records, { config }) {
    const alerts: RiskAlert[] = [];

    for (const record of records) {
      const lowFields = AUDITED_FIELDS.filter((field) => {
        const value = record.confidence[field];
        return value !== undefined && value < config.auditConfidence;
      });

      if (lowFields.length === 0) {
        continue;
      }

      const lowest = Math.min(...lowFields.map((field) => record.confidence[field] ?? 1));

      alerts.push({
        severity: 'medium',
        type: 'low_confidence_fields',
        message: `Low confidence in fields: ${lowFields.join(', ')} for transaction ${record.id ?? '(unsaved)'}`,
        transactionIds: idsOf([record]),
        recommendedAction: 'Review and correct the low-confidence fields',
        evidence: {
          fields: lowFields.join(','),
          lowestConfidence: lowest,
          threshold: config.auditConfidence,
        },
      });
    }

    return alerts;
  },
};

export default lowConfidenceRule;
