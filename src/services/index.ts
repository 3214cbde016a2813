export { healthService, HealthService } from './health.service';
export { reconciliationService } from './reconciliation.service';
export * from './reconciliation.service';
export { ledgerService } from './ledger.service';
export * from './ledger.service';
export { riskService } from './risk.service';
export * from './risk.service';
export { categoryService } from './category.service';
export * from './category.service';
