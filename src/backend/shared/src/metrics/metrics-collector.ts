/**
 * Metrics Collection Module
 *
 * Counters, gauges and histograms for request latency, score distribution,
 * quality tiers, filter bypasses and catalog rebuilds. Aggregates are kept in
 * memory, along with the most recent raw entries (up to `maxEntries`), and
 * optionally forwarded to a telemetry sink.
 *
 * @tested tests/integration/recommendation-engine.integration.test.ts
 */

import type { TelemetryClient } from '../logging/logger.js';

export const MetricType = {
  COUNTER: 'counter',
  GAUGE: 'gauge',
  HISTOGRAM: 'histogram',
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

export interface MetricEntry {
  name: string;
  type: MetricType;
  value: number;
  timestamp: Date;
  tags: Record<string, string>;
}

export interface HistogramBuckets {
  boundaries: number[];
  counts: number[];
  sum: number;
  count: number;
}

export interface MetricsCollectorConfig {
  serviceName: string;
  enableConsole: boolean;
  maxEntries: number;
  telemetryClient?: TelemetryClient;
  defaultTags: Record<string, string>;
}

export const defaultMetricsConfig: MetricsCollectorConfig = {
  serviceName: 'service-match',
  enableConsole: false,
  maxEntries: 1000,
  defaultTags: {},
};

export const MetricNames = {
  // Request metrics
  REQUEST_LATENCY: 'recommendation_latency_ms',
  REQUEST_COUNT: 'recommendation_count',
  REQUEST_ERROR_COUNT: 'recommendation_error_count',

  // Result metrics
  RECOMMENDATION_SCORE: 'recommendation_score',
  QUALITY_TIER_COUNT: 'quality_tier_count',
  FILTER_BYPASS_COUNT: 'filter_bypass_count',

  // Catalog metrics
  CATALOG_SIZE: 'catalog_size',
  CATALOG_REBUILD_COUNT: 'catalog_rebuild_count',
  CATALOG_REBUILD_LATENCY: 'catalog_rebuild_latency_ms',
} as const;

/**
 * Histogram buckets for latency metrics (in milliseconds)
 */
export const DEFAULT_LATENCY_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000];

/**
 * Histogram buckets for scores in [0, 1]
 */
export const DEFAULT_SCORE_BUCKETS = [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1.0];

export class MetricsCollector {
  private config: MetricsCollectorConfig;
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();
  private histograms: Map<string, HistogramBuckets> = new Map();
  private metricEntries: MetricEntry[] = [];

  constructor(config: Partial<MetricsCollectorConfig> = {}) {
    this.config = { ...defaultMetricsConfig, ...config };
  }

  /**
   * Gets all metric entries (for testing)
   */
  getMetricEntries(): MetricEntry[] {
    return [...this.metricEntries];
  }

  private createMetricKey(name: string, tags: Record<string, string>): string {
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return sortedTags ? `${name}:${sortedTags}` : name;
  }

  private recordEntry(
    name: string,
    type: MetricType,
    value: number,
    tags: Record<string, string> = {}
  ): void {
    const entry: MetricEntry = {
      name,
      type,
      value,
      timestamp: new Date(),
      tags: { ...this.config.defaultTags, ...tags },
    };

    this.metricEntries.push(entry);
    if (this.metricEntries.length > this.config.maxEntries) {
      this.metricEntries.splice(0, this.metricEntries.length - this.config.maxEntries);
    }

    if (this.config.enableConsole) {
      console.log(JSON.stringify(entry));
    }

    this.config.telemetryClient?.trackMetric(name, value, {
      service: this.config.serviceName,
      metricType: type,
      ...entry.tags,
    });
  }

  incrementCounter(name: string, value = 1, tags: Record<string, string> = {}): void {
    const key = this.createMetricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.recordEntry(name, MetricType.COUNTER, value, tags);
  }

  getCounter(name: string, tags: Record<string, string> = {}): number {
    return this.counters.get(this.createMetricKey(name, tags)) ?? 0;
  }

  setGauge(name: string, value: number, tags: Record<string, string> = {}): void {
    this.gauges.set(this.createMetricKey(name, tags), value);
    this.recordEntry(name, MetricType.GAUGE, value, tags);
  }

  getGauge(name: string, tags: Record<string, string> = {}): number {
    return this.gauges.get(this.createMetricKey(name, tags)) ?? 0;
  }

  recordHistogram(
    name: string,
    value: number,
    tags: Record<string, string> = {},
    buckets: number[] = DEFAULT_LATENCY_BUCKETS
  ): void {
    const key = this.createMetricKey(name, tags);

    let histogram = this.histograms.get(key);
    if (!histogram) {
      histogram = {
        boundaries: buckets,
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      };
      this.histograms.set(key, histogram);
    }

    const found = histogram.boundaries.findIndex((boundary) => value <= boundary);
    const bucketIndex = found === -1 ? histogram.boundaries.length : found;

    histogram.counts[bucketIndex] += 1;
    histogram.sum += value;
    histogram.count += 1;

    this.recordEntry(name, MetricType.HISTOGRAM, value, tags);
  }

  getHistogram(name: string, tags: Record<string, string> = {}): HistogramBuckets | undefined {
    return this.histograms.get(this.createMetricKey(name, tags));
  }

  recordRequestLatency(durationMs: number, tags: Record<string, string> = {}): void {
    this.recordHistogram(MetricNames.REQUEST_LATENCY, durationMs, tags);
    this.incrementCounter(MetricNames.REQUEST_COUNT, 1, tags);
  }

  recordRequestError(tags: Record<string, string> = {}): void {
    this.incrementCounter(MetricNames.REQUEST_ERROR_COUNT, 1, tags);
  }

  /**
   * Records the score and tier of one returned recommendation
   */
  recordRecommendation(score: number, quality: string, tags: Record<string, string> = {}): void {
    this.recordHistogram(MetricNames.RECOMMENDATION_SCORE, score, tags, DEFAULT_SCORE_BUCKETS);
    this.incrementCounter(MetricNames.QUALITY_TIER_COUNT, 1, { ...tags, quality });
  }

  recordFilterBypass(tags: Record<string, string> = {}): void {
    this.incrementCounter(MetricNames.FILTER_BYPASS_COUNT, 1, tags);
  }

  recordCatalogRebuild(size: number, durationMs: number): void {
    this.setGauge(MetricNames.CATALOG_SIZE, size);
    this.incrementCounter(MetricNames.CATALOG_REBUILD_COUNT);
    this.recordHistogram(MetricNames.CATALOG_REBUILD_LATENCY, durationMs);
  }
}

export function createMetricsCollector(
  config: Partial<MetricsCollectorConfig> = {}
): MetricsCollector {
  return new MetricsCollector(config);
}
