/**
 * Potential tax-deductible expense: category in the deductible set
 * (case-insensitive) and amount above `taxDeductibleMinAmount`.
 */

import { amountOf, idsOf } from '../helpers';
import type { RiskAlert, RiskRule } from '../types';

export const taxDeductibleRule: RiskRule = {
  type: 'potential_tax_deductible',

  evaluate(records, { config }) {
    const deductible = new Set(config.taxDeductibleCategories.map((category) => category.trim().toLowerCase()));
    const alerts: RiskAlert[] = [];

    for (const record of records) {
      const category = record.category.trim();
      const amount = amountOf(record);

      if (!deductible.has(category.toLowerCase()) || amount <= config.taxDeductibleMinAmount) {
        continue;
      }

      alerts.push({
        severity: 'low',
        type: 'potential_tax_deductible',
        message: `Potential tax-deductible expense in category ${category} for amount ${amount}`,
        transactionIds: idsOf([record]),
        recommendedAction: 'Check if this expense qualifies for tax deduction',
        evidence: { category, amount },
      });
    }

    return alerts;
  },
};

export default taxDeductibleRule;
