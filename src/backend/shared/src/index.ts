/**
 * Shared Package
 *
 * Canonical models, schemas, errors, normalization, logging and metrics
 * used by every service-match package.
 */

// Service and preference models
export * from './models/service.js';
export * from './models/preference.js';

// Engine configuration
export * from './models/engine-config.js';

// Recommendation results
export * from './models/recommendation.js';

// Errors
export * from './errors/errors.js';

// Category normalization
export * from './normalization/category-normalizer.js';

// Logging
export * from './logging/logger.js';

// Metrics
export * from './metrics/metrics-collector.js';
