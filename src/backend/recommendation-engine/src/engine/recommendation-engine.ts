/**
 * Recommendation Engine
 *
 * Wires the catalog store, validated configuration, logging and metrics
 * behind one object. Configuration is validated at construction, so a bad
 * value fails before the first request is scored.
 *
 * @tested tests/integration/recommendation-engine.integration.test.ts
 */

import {
  MetricNames,
  NotFoundError,
  getLogger,
  resolveEngineConfig,
  standardizePreference,
  validatePreference,
  type CleaningReport,
  type EngineConfig,
  type Logger,
  type MetricsCollector,
  type PreferenceRecord,
  type QualityTier,
  type RecommendationResult,
  type ServiceRecord,
} from '@service-match/shared';
import {
  explainMatch,
  summarizeRecommendations,
  type FieldComparison,
  type RecommendationSummary,
} from '@service-match/explainability-layer';

import { CatalogStore, type EncodedCatalog } from '../encoding/encoded-catalog.js';
import { encodeRecord } from '../encoding/feature-encoder.js';
import { classifyQuality } from '../quality/quality-classifier.js';
import { rankServices, type RankingResponse } from '../ranking/service-ranker.js';
import { resolveStrategy } from '../scoring/strategy-registry.js';

export interface RecommendationEngineOptions {
  config?: Partial<EngineConfig>;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Report of the cleaning run that produced the initial services */
  cleaningReport?: CleaningReport;
}

export interface RecommendationRequestOptions {
  topN?: number;
  strategy?: string;
  correlationId?: string;
}

export interface ServiceExplanation {
  service: ServiceRecord;
  strategy: string;
  score: number;
  quality: QualityTier;
  explanation: string;
  comparisons: FieldComparison[];
}

export interface CatalogStatistics {
  totalServices: number;
  /** Rows in the raw dataset before cleaning; totalServices when unknown */
  originalServices: number;
  businessTypes: number;
  locations: number;
  priceDistribution: Record<string, number>;
  languageDistribution: Record<string, number>;
  catalogVersion: number;
  builtAt: string;
  cleaningReport: CleaningReport | null;
}

function countBy(services: readonly ServiceRecord[], pick: (service: ServiceRecord) => string): Record<string, number> {
  const counts = new Map<string, number>();
  for (const service of services) {
    const key = pick(service);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

export class RecommendationEngine {
  readonly config: EngineConfig;
  private readonly store: CatalogStore;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(services: readonly ServiceRecord[] = [], options: RecommendationEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.logger = options.logger ?? getLogger();
    this.metrics = options.metrics;
    this.store = new CatalogStore(services, options.cleaningReport);
    this.metrics?.setGauge(MetricNames.CATALOG_SIZE, this.store.size);

    this.logger.info('Recommendation engine ready', {
      catalogSize: this.store.size,
      strategy: this.config.strategy,
      topN: this.config.topN,
    });
  }

  catalog(): EncodedCatalog {
    return this.store.current();
  }

  rankServices(preference: unknown, options: RecommendationRequestOptions = {}): RankingResponse {
    try {
      return rankServices(preference, this.store.current(), this.config, {
        ...options,
        logger: this.logger,
        metrics: this.metrics,
      });
    } catch (error) {
      this.metrics?.recordRequestError({ strategy: options.strategy ?? this.config.strategy });
      throw error;
    }
  }

  getRecommendations(
    preference: unknown,
    options: RecommendationRequestOptions = {}
  ): RecommendationResult[] {
    return this.rankServices(preference, options).recommendations;
  }

  /**
   * Scores and explains a single service against a preference
   *
   * @throws NotFoundError when the id is not in the catalog
   */
  explainRecommendation(serviceId: string, preferenceInput: unknown, strategyName?: string): ServiceExplanation {
    const strategy = resolveStrategy(strategyName ?? this.config.strategy);
    const preference = standardizePreference(validatePreference(preferenceInput));

    const catalog = this.store.current();
    const entry = catalog.services.find((candidate) => candidate.service.id === serviceId);
    if (!entry) {
      throw new NotFoundError(`Service not found: ${serviceId}`);
    }

    const score = strategy.score({
      preference,
      preferenceVector: encodeRecord(preference, catalog.model),
      service: entry.service,
      serviceVector: entry.vector,
      model: catalog.model,
      config: this.config,
    });
    const quality = classifyQuality(score, this.config.qualityThresholds);
    const match = explainMatch(preference, entry.service, score, quality);

    return {
      service: entry.service,
      strategy: strategy.name,
      score,
      quality,
      explanation: match.text,
      comparisons: match.comparisons,
    };
  }

  summarize(results: readonly RecommendationResult[], preference: PreferenceRecord): RecommendationSummary {
    return summarizeRecommendations(results, preference);
  }

  getStatistics(): CatalogStatistics {
    const catalog = this.store.current();
    const services = catalog.services.map((entry) => entry.service);

    return {
      totalServices: services.length,
      originalServices: catalog.cleaningReport?.originalRecords ?? services.length,
      businessTypes: new Set(services.map((s) => s.businessType)).size,
      locations: new Set(services.map((s) => s.locationArea)).size,
      priceDistribution: countBy(services, (s) => s.priceCategory),
      languageDistribution: countBy(services, (s) => s.languageSupport),
      catalogVersion: catalog.version,
      builtAt: catalog.builtAt,
      cleaningReport: catalog.cleaningReport ? { ...catalog.cleaningReport } : null,
    };
  }

  /**
   * Rebuilds the encoded catalog and swaps it in
   */
  reloadCatalog(services: readonly ServiceRecord[], cleaningReport?: CleaningReport): EncodedCatalog {
    const started = performance.now();
    const next = this.store.reload(services, cleaningReport);
    const durationMs = performance.now() - started;

    this.metrics?.recordCatalogRebuild(next.services.length, durationMs);
    this.logger.info('Catalog reloaded', {
      catalogVersion: next.version,
      catalogSize: next.services.length,
      durationMs,
    });

    return next;
  }
}
