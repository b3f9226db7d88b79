/**
 * Recommendation Engine
 *
 * Feature encoding, scoring strategies, ranking and quality classification
 * for matching preferences against the service catalog.
 */

export const VERSION = '1.0.0';

// Encoding
export * from './encoding/feature-encoder.js';
export * from './encoding/encoded-catalog.js';

// Scoring strategies
export * from './scoring/types.js';
export * from './scoring/weighted-scorer.js';
export * from './scoring/cosine-scorer.js';
export * from './scoring/knn-scorer.js';
export * from './scoring/strategy-registry.js';

// Quality
export * from './quality/quality-classifier.js';

// Ranking
export * from './ranking/hard-filter.js';
export * from './ranking/service-ranker.js';

// Engine facade
export * from './engine/recommendation-engine.js';
