/**
 * Risk Analyzer
 *
 * Runs a registered list of rules over one snapshot of the ledger and
 * concatenates their alerts in rule order. Rules are independent: there
 * is no cross-rule deduplication, and adding or removing a rule does
 * not touch the others.
 *
 * Default rules, in order:
 * 1. Duplicate charges (medium)
 * 2. Unusually large transaction (high)
 * 3. Low-confidence fields (medium)
 * 4. Sudden category spend shift (medium)
 * 5. Recurring subscription (low)
 * 6. Projected balance depletion (high)
 * 7. First-time high-value vendor (medium)
 * 8. Weekend spending spike (low)
 * 9. Potential tax-deductible expense (low)
 */

import { DEFAULT_CONFIG } from '../config';
import {
  balanceDepletionRule,
  categoryShiftRule,
  duplicateChargesRule,
  firstTimeVendorRule,
  largeTransactionRule,
  lowConfidenceRule,
  subscriptionRule,
  taxDeductibleRule,
  weekendSpikeRule,
} from './rules';
import type { ReconciliationConfig } from '../config';
import type { TransactionRecord } from '../types';
import type { RiskAlert, RiskAlertType, RiskAnalysis, RiskRule } from './types';

export interface AnalyzeOptions {
  /** Reference instant for projections; defaults to the current time */
  now?: Date;
}

export function createDefaultRiskRules(): RiskRule[] {
  return [
    duplicateChargesRule,
    largeTransactionRule,
    lowConfidenceRule,
    categoryShiftRule,
    subscriptionRule,
    balanceDepletionRule,
    firstTimeVendorRule,
    weekendSpikeRule,
    taxDeductibleRule,
  ];
}

export class RiskAnalyzer {
  private readonly rules: readonly RiskRule[];

  constructor(
    rules: readonly RiskRule[] = createDefaultRiskRules(),
    private readonly config: ReconciliationConfig = DEFAULT_CONFIG
  ) {
    this.rules = [...rules];
  }

  getRuleTypes(): RiskAlertType[] {
    return this.rules.map((rule) => rule.type);
  }

  /**
   * Evaluates every rule against the same snapshot.
   *
   * @example
   * new RiskAnalyzer().analyze(records, { now: new Date(2024, 5, 15) })
   * // { alerts: [{ type: 'subscription_detected', severity: 'low', ... }], noAlerts: false }
   */
  analyze(records: readonly TransactionRecord[], options: AnalyzeOptions = {}): RiskAnalysis {
    if (records.length === 0) {
      return { alerts: [], noAlerts: true };
    }

    const context = { config: this.config, now: options.now ?? new Date() };
    const alerts: RiskAlert[] = this.rules.flatMap((rule) => rule.evaluate(records, context));

    return { alerts, noAlerts: alerts.length === 0 };
  }
}

export default RiskAnalyzer;
