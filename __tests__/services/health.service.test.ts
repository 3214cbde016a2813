import { HealthService } from '../../src/services/health.service';

describe('HealthService', () => {
  let healthService: HealthService;

  beforeEach(() => {
    healthService = new HealthService();
  });

  describe('getHealthStatus', () => {
    it('should return health status with all required fields', () => {
      const status = healthService.getHealthStatus();

      expect(status).toHaveProperty('status', 'healthy');
      expect(status).toHaveProperty('timestamp');
      expect(status).toHaveProperty('uptime');
      expect(status).toHaveProperty('environment');
      expect(status).toHaveProperty('version');
      expect(status).toHaveProperty('engine');
    });

    it('should return a valid ISO timestamp', () => {
      const status = healthService.getHealthStatus();

      expect(new Date(status.timestamp).toISOString()).toBe(status.timestamp);
    });

    it('should return non-negative uptime', () => {
      const status = healthService.getHealthStatus();

      expect(status.uptime).toBeGreaterThanOrEqual(0);
    });

    it('should return version string', () => {
      const status = healthService.getHealthStatus();

      expect(typeof status.version).toBe('string');
      expect(status.version.length).toBeGreaterThan(0);
    });
  });

  describe('getEngineInfo', () => {
    it('should report the configured thresholds', () => {
      const info = healthService.getEngineInfo();

      expect(info.dateOrder).toBe('DMY');
      expect(info.defaultCurrency).toBe('PKR');
      expect(info.duplicateThreshold).toBe(70);
      expect(info.needsReviewConfidence).toBe(0.7);
    });

    it('should list the risk rules in evaluation order', () => {
      const info = healthService.getEngineInfo();

      expect(info.riskRules).toHaveLength(9);
      expect(info.riskRules[0]).toBe('duplicate_charges');
      expect(info.riskRules[8]).toBe('potential_tax_deductible');
    });

    it('should end the category list with Other', () => {
      const info = healthService.getEngineInfo();

      expect(info.categories[info.categories.length - 1]).toBe('Other');
    });
  });

  describe('checkReadiness', () => {
    it('should return readiness status', () => {
      const result = healthService.checkReadiness();

      expect(result).toHaveProperty('ready');
      expect(result).toHaveProperty('checks');
      expect(typeof result.ready).toBe('boolean');
    });

    it('should include server check', () => {
      const result = healthService.checkReadiness();

      expect(result.checks).toHaveProperty('server', true);
    });

    it('should check the engine configuration, categories and rules', () => {
      const result = healthService.checkReadiness();

      expect(result.checks).toEqual({ server: true, engineConfig: true, categories: true, riskRules: true });
    });

    it('should be ready when all checks pass', () => {
      const result = healthService.checkReadiness();

      expect(result.ready).toBe(true);
    });
  });
});
