/**
 * Service Ranking
 *
 * Filters, scores, sorts and selects the top services for a preference, then
 * attaches quality tiers and explanations. Ties keep catalog order, so the
 * same inputs always produce the same list.
 *
 * @tested tests/integration/recommendation-scenarios.integration.test.ts
 * @tested tests/property/top-n-contract.property.test.ts
 */

import {
  InvalidArgumentError,
  getLogger,
  standardizePreference,
  validateEngineConfig,
  validatePreference,
  type EngineConfig,
  type Logger,
  type MetricsCollector,
  type PreferenceRecord,
  type RecommendationResult,
  type ServiceRecord,
  type StrategyName,
} from '@service-match/shared';
import { explain } from '@service-match/explainability-layer';

import { buildEncodedCatalog, type EncodedCatalog, type EncodedService } from '../encoding/encoded-catalog.js';
import { classifyQuality } from '../quality/quality-classifier.js';
import { resolveStrategy } from '../scoring/strategy-registry.js';
import { applyBusinessTypeFilter } from './hard-filter.js';

export interface RankingOptions {
  strategy?: string;
  topN?: number;
  correlationId?: string;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface RankingResponse {
  recommendations: RecommendationResult[];
  preference: PreferenceRecord;
  strategy: StrategyName;
  topN: number;
  totalServicesEvaluated: number;
  candidateCount: number;
  filterBypassed: boolean;
  hasWarning: boolean;
  warning?: string;
  catalogVersion: number;
  processingTimeMs: number;
}

interface ScoredCandidate {
  entry: EncodedService;
  score: number;
}

/**
 * Score descending, then catalog order
 */
export function compareScoredCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.entry.index - b.entry.index;
}

/**
 * @throws InvalidArgumentError unless topN is a positive integer
 */
export function validateTopN(topN: number): number {
  if (!Number.isInteger(topN) || topN <= 0) {
    throw new InvalidArgumentError(`topN must be a positive integer, got ${topN}`, [
      { field: 'topN', message: 'Must be a positive integer', code: 'too_small' },
    ]);
  }
  return topN;
}

function toEncodedCatalog(catalog: EncodedCatalog | readonly ServiceRecord[]): EncodedCatalog {
  return 'model' in catalog ? catalog : buildEncodedCatalog(catalog);
}

/**
 * Ranks the catalog for one preference and reports how the ranking went
 *
 * @throws ConfigurationError for an invalid configuration or an unknown strategy
 * @throws InvalidArgumentError for a bad topN
 * @throws PreferenceValidationError for a missing or blank preference field
 */
export function rankServices(
  preferenceInput: unknown,
  catalogInput: EncodedCatalog | readonly ServiceRecord[],
  configInput: EngineConfig,
  options: RankingOptions = {}
): RankingResponse {
  const config = validateEngineConfig(configInput);
  const startedAt = performance.now();
  const baseLogger = options.logger ?? getLogger();
  const logger = options.correlationId ? baseLogger.child(options.correlationId) : baseLogger;
  const { metrics } = options;

  const topN = validateTopN(options.topN ?? config.topN);
  const strategy = resolveStrategy(options.strategy ?? config.strategy);
  const preference = standardizePreference(validatePreference(preferenceInput));
  const catalog = toEncodedCatalog(catalogInput);

  const filter = applyBusinessTypeFilter(preference, catalog.services, config.requireBusinessTypeMatch);
  if (filter.bypassed) {
    logger.warn('Business type filter bypassed', {
      businessType: preference.businessType,
      catalogSize: catalog.services.length,
    });
    metrics?.recordFilterBypass({ strategy: strategy.name });
  }

  const scores = strategy.scoreCatalog(preference, filter.candidates, catalog.model, config);
  const ranked: ScoredCandidate[] = filter.candidates
    .map((entry, i) => ({ entry, score: scores[i] ?? 0 }))
    .sort(compareScoredCandidates);

  const recommendations: RecommendationResult[] = ranked.slice(0, topN).map(({ entry, score }, i) => {
    const quality = classifyQuality(score, config.qualityThresholds);
    return {
      rank: i + 1,
      service: entry.service,
      score,
      quality,
      explanation: explain(preference, entry.service, score, quality),
    };
  });

  let warning: string | undefined;
  if (catalog.services.length === 0) {
    warning = 'Catalog is empty; no services to rank';
  } else if (filter.bypassed) {
    warning = filter.explanation;
  } else if (recommendations.length < topN) {
    warning = `Only ${recommendations.length} candidate service(s) available for topN ${topN}`;
  }

  const processingTimeMs = performance.now() - startedAt;

  logger.logRecommendation({
    correlationId: options.correlationId,
    strategy: strategy.name,
    topN,
    catalogSize: catalog.services.length,
    candidateCount: filter.candidates.length,
    filterBypassed: filter.bypassed,
    resultIds: recommendations.map((r) => r.service.id),
    processingTimeMs,
  });

  if (metrics) {
    metrics.recordRequestLatency(processingTimeMs, { strategy: strategy.name });
    for (const recommendation of recommendations) {
      metrics.recordRecommendation(recommendation.score, recommendation.quality, { strategy: strategy.name });
    }
  }

  return {
    recommendations,
    preference,
    strategy: strategy.name,
    topN,
    totalServicesEvaluated: catalog.services.length,
    candidateCount: filter.candidates.length,
    filterBypassed: filter.bypassed,
    hasWarning: warning !== undefined,
    warning,
    catalogVersion: catalog.version,
    processingTimeMs,
  };
}

/**
 * Top-N recommendations for a preference, ordered by score descending
 */
export function recommend(
  preference: unknown,
  catalog: EncodedCatalog | readonly ServiceRecord[],
  strategy: string,
  topN: number,
  config: EngineConfig,
  options: Omit<RankingOptions, 'strategy' | 'topN'> = {}
): RecommendationResult[] {
  return rankServices(preference, catalog, config, { ...options, strategy, topN }).recommendations;
}
