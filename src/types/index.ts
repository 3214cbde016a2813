import type { DateOrder, RiskAlertType } from '../reconciliation';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  LOG_DIR: string;
  JSON_BODY_LIMIT: string;
  // Engine tuning
  DATE_ORDER: DateOrder;
  DEFAULT_CURRENCY: string;
  DUPLICATE_THRESHOLD: number;
  CONFIDENCE_THRESHOLD: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  details?: unknown;
  timestamp: string;
}

// Engine settings reported by the health endpoint
export interface EngineInfo {
  dateOrder: DateOrder;
  defaultCurrency: string;
  duplicateThreshold: number;
  needsReviewConfidence: number;
  categories: string[];
  riskRules: RiskAlertType[];
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
  engine: EngineInfo;
}

export interface ReadinessChecks {
  server: boolean;
  engineConfig: boolean;
  categories: boolean;
  riskRules: boolean;
}
