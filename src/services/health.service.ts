import { categorizer, engineConfig, env } from '../config';
import { ReconciliationConfigSchema, createDefaultRiskRules } from '../reconciliation';
import type { EngineInfo, HealthCheckResponse, ReadinessChecks } from '../types';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status, including the settings the engine runs with
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
      engine: this.getEngineInfo(),
    };
  }

  getEngineInfo(): EngineInfo {
    return {
      dateOrder: engineConfig.dateOrder,
      defaultCurrency: engineConfig.defaultCurrency,
      duplicateThreshold: engineConfig.duplicateThreshold,
      needsReviewConfidence: engineConfig.needsReviewConfidence,
      categories: categorizer.getCategories(),
      riskRules: createDefaultRiskRules().map((rule) => rule.type),
    };
  }

  /**
   * Check if the service is ready to reconcile.
   * The engine has no external dependencies; readiness means its
   * configuration, category table and rule registry are usable.
   */
  checkReadiness(): { ready: boolean; checks: ReadinessChecks } {
    const checks: ReadinessChecks = {
      server: true,
      engineConfig: ReconciliationConfigSchema.safeParse(engineConfig).success,
      categories: categorizer.getCategories().length > 1,
      riskRules: createDefaultRiskRules().length > 0,
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
