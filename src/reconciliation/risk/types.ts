/**
 * Risk Analysis Types
 *
 * Alerts are computed fresh on every analysis and never stored by the engine.
 */

import type { ReconciliationConfig } from '../config';
import type { RecordId, TransactionRecord } from '../types';

export type RiskSeverity = 'low' | 'medium' | 'high';

export type RiskAlertType =
  | 'duplicate_charges'
  | 'unusually_large_transaction'
  | 'low_confidence_fields'
  | 'sudden_category_change'
  | 'subscription_detected'
  | 'projected_balance_risk'
  | 'first_time_high_value_vendor'
  | 'weekend_spending_spike'
  | 'potential_tax_deductible';

export interface RiskAlert {
  severity: RiskSeverity;
  type: RiskAlertType;
  message: string;
  /** May be empty for forward-looking projections */
  transactionIds: RecordId[];
  recommendedAction: string;
  /** Figures the rule based its decision on */
  evidence: Record<string, number | string>;
}

export interface RiskContext {
  config: ReconciliationConfig;
  /** Reference instant for future-dated projections */
  now: Date;
}

/**
 * A single detection rule. Rules read the snapshot and never modify it.
 */
export interface RiskRule {
  readonly type: RiskAlertType;
  evaluate(records: readonly TransactionRecord[], context: RiskContext): RiskAlert[];
}

export interface RiskAnalysis {
  alerts: RiskAlert[];
  /** True when no rule fired, as opposed to "not analyzed yet" */
  noAlerts: boolean;
}
