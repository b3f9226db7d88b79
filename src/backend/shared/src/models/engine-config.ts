/**
 * Engine Configuration Schema
 *
 * Field weights, quality thresholds, result size and scoring strategy.
 * Configuration is validated before any request is scored; a bad value raises
 * a ConfigurationError instead of silently degrading the ranking.
 *
 * @tested tests/property/engine-config.property.test.ts
 */

import { z } from 'zod';

import { ConfigurationError, formatValidationErrors } from '../errors/errors.js';

export const STRATEGY_NAMES = ['weighted', 'cosine', 'knn'] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export const StrategyNameSchema = z.enum(STRATEGY_NAMES);

const WEIGHT_SUM_TOLERANCE = 0.001;

/**
 * Per-field weights; must sum to 1.0
 */
export const FieldWeightsSchema = z
  .object({
    businessType: z.number().min(0).max(1),
    priceCategory: z.number().min(0).max(1),
    languageSupport: z.number().min(0).max(1),
    locationArea: z.number().min(0).max(1),
  })
  .refine(
    (w) =>
      Math.abs(w.businessType + w.priceCategory + w.languageSupport + w.locationArea - 1) <
      WEIGHT_SUM_TOLERANCE,
    { message: 'Weights must sum to 1.0' }
  );

export type FieldWeights = z.infer<typeof FieldWeightsSchema>;

/**
 * Lower bounds of the High and Medium tiers; Low starts at 0
 */
export const QualityThresholdsSchema = z
  .object({
    high: z.number().min(0).max(1),
    medium: z.number().min(0).max(1),
  })
  .refine((t) => t.high >= t.medium, {
    message: 'High threshold must not be below the Medium threshold',
    path: ['high'],
  });

export type QualityThresholds = z.infer<typeof QualityThresholdsSchema>;

export const EngineConfigSchema = z.object({
  weights: FieldWeightsSchema,
  qualityThresholds: QualityThresholdsSchema,
  topN: z.number().int().positive(),
  strategy: StrategyNameSchema,
  exactMatchBonus: z.number().min(0).max(1),
  pricePartialCredit: z.number().min(0).max(1),
  knnMaxDistance: z.number().positive().optional(),
  requireBusinessTypeMatch: z.boolean(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_FIELD_WEIGHTS: FieldWeights = {
  businessType: 0.35,
  priceCategory: 0.25,
  languageSupport: 0.2,
  locationArea: 0.2,
};

export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = {
  high: 0.75,
  medium: 0.5,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  weights: DEFAULT_FIELD_WEIGHTS,
  qualityThresholds: DEFAULT_QUALITY_THRESHOLDS,
  topN: 3,
  strategy: 'weighted',
  exactMatchBonus: 0.05,
  pricePartialCredit: 0.5,
  requireBusinessTypeMatch: false,
};

/**
 * Validates a full engine configuration
 *
 * @throws ConfigurationError with field-level details
 */
export function validateEngineConfig(data: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError('Invalid engine configuration', formatValidationErrors(result.error));
  }
  return result.data;
}

/**
 * Merges a partial configuration over the defaults and validates the result
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number`, [
      { field: key, message: `Expected a number, got "${raw}"`, code: 'invalid_type' },
    ]);
  }
  return parsed;
}

/**
 * Reads the engine configuration from environment variables over the defaults
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  const knnMaxDistance = env.RECOMMENDATION_KNN_MAX_DISTANCE;

  return validateEngineConfig({
    weights: {
      businessType: readNumber(env, 'WEIGHT_BUSINESS_TYPE', d.weights.businessType),
      priceCategory: readNumber(env, 'WEIGHT_PRICE_CATEGORY', d.weights.priceCategory),
      languageSupport: readNumber(env, 'WEIGHT_LANGUAGE_SUPPORT', d.weights.languageSupport),
      locationArea: readNumber(env, 'WEIGHT_LOCATION_AREA', d.weights.locationArea),
    },
    qualityThresholds: {
      high: readNumber(env, 'QUALITY_THRESHOLD_HIGH', d.qualityThresholds.high),
      medium: readNumber(env, 'QUALITY_THRESHOLD_MEDIUM', d.qualityThresholds.medium),
    },
    topN: readNumber(env, 'RECOMMENDATION_TOP_N', d.topN),
    strategy: env.RECOMMENDATION_STRATEGY || d.strategy,
    exactMatchBonus: readNumber(env, 'RECOMMENDATION_EXACT_MATCH_BONUS', d.exactMatchBonus),
    pricePartialCredit: readNumber(env, 'RECOMMENDATION_PRICE_PARTIAL_CREDIT', d.pricePartialCredit),
    knnMaxDistance: knnMaxDistance ? readNumber(env, 'RECOMMENDATION_KNN_MAX_DISTANCE', 0) : undefined,
    requireBusinessTypeMatch: env.RECOMMENDATION_EXACT_BUSINESS_TYPE === 'true',
  });
}
