export { RiskAnalyzer, createDefaultRiskRules } from './riskAnalyzer';
export * from './rules';
export type { AnalyzeOptions } from './riskAnalyzer';
export type {
  RiskAlert,
  RiskAlertType,
  RiskAnalysis,
  RiskContext,
  RiskRule,
  RiskSeverity,
} from './types';
