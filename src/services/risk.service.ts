/**
 * Risk Service
 *
 * On-demand risk audit over the full record snapshot.
 */

import { engineConfig } from '../config';
import { RiskAnalyzer, createDefaultRiskRules } from '../reconciliation';
import { Logging } from '../utils';
import type { RiskAnalysis, RiskSeverity, TransactionRecord } from '../reconciliation';

const analyzer = new RiskAnalyzer(createDefaultRiskRules(), engineConfig);

export function analyzeRisks(records: readonly TransactionRecord[], now: Date = new Date()): RiskAnalysis {
  const result = analyzer.analyze(records, { now });

  const bySeverity: Record<RiskSeverity, number> = { high: 0, medium: 0, low: 0 };
  for (const alert of result.alerts) {
    bySeverity[alert.severity] += 1;
  }

  Logging.info(
    `Risk analysis over ${records.length} records: ${result.alerts.length} alert(s) ` +
      `(high ${bySeverity.high}, medium ${bySeverity.medium}, low ${bySeverity.low})`
  );

  if (bySeverity.high > 0) {
    const types = result.alerts.filter((alert) => alert.severity === 'high').map((alert) => alert.type);
    Logging.warn(`High-severity risk alerts: ${[...new Set(types)].join(', ')}`);
  }

  return result;
}

export const riskService = {
  analyzeRisks,
};

export default riskService;
