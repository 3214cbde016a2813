import { z } from 'zod';
import { Categorizer, CategoryKeywordTableSchema, DateOrderSchema, resolveConfig } from '../reconciliation';
import type { ReconciliationConfig } from '../reconciliation';
import type { EnvConfig } from '../types';
import categoryKeywords from './categoryKeywords.json';

const csv = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z.string().default('*').transform(csv),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_DIR: z.string().min(1).default('logs'),
  JSON_BODY_LIMIT: z.string().regex(/^\d+(b|kb|mb)$/i, 'must look like 500kb or 5mb').default('5mb'),
  // Engine tuning
  DATE_ORDER: DateOrderSchema.default('DMY'),
  DEFAULT_CURRENCY: z.string().length(3).default('PKR'),
  DUPLICATE_THRESHOLD: z.coerce.number().min(0).max(100).default(70),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
});

/**
 * Parse an environment (process.env by default), failing fast with
 * every problem listed.
 */
export const loadEnv = (source: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }

  return parsed.data;
};

export const env: EnvConfig = loadEnv();

/**
 * Engine thresholds derived from an environment
 */
export const buildEngineConfig = (source: EnvConfig): ReconciliationConfig =>
  resolveConfig({
    duplicateThreshold: source.DUPLICATE_THRESHOLD,
    needsReviewConfidence: source.CONFIDENCE_THRESHOLD,
    dateOrder: source.DATE_ORDER,
    defaultCurrency: source.DEFAULT_CURRENCY,
  });

export const engineConfig = buildEngineConfig(env);

/**
 * Default category table (English, Urdu and romanized Urdu keywords)
 */
export const categoryTable = CategoryKeywordTableSchema.parse(categoryKeywords);

export const categorizer = new Categorizer(categoryTable);

export default env;
