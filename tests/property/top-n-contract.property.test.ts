/**
 * Property: Top-N Contract
 *
 * A ranking returns min(topN, candidates) results with consecutive ranks,
 * scores in descending order and tiers that match the scores. Invalid topN
 * values are rejected before any scoring happens.
 *
 * @file src/backend/recommendation-engine/src/ranking/service-ranker.ts
 * @file src/backend/recommendation-engine/src/ranking/hard-filter.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  ConfigurationError,
  DEFAULT_ENGINE_CONFIG,
  InvalidArgumentError,
  PreferenceValidationError,
  STRATEGY_NAMES,
  createLogger,
  resolveEngineConfig,
  type ServiceRecord,
} from '../../src/backend/shared/src/index.js';
import {
  classifyQuality,
  rankServices,
  validateTopN,
} from '../../src/backend/recommendation-engine/src/index.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const logger = createLogger({ enableConsole: false });

const categoricalRecord = fc.record({
  businessType: fc.constantFrom('Retail', 'Technology', 'Healthcare'),
  priceCategory: fc.constantFrom('Low', 'Medium', 'High'),
  languageSupport: fc.constantFrom('Hindi', 'English', 'Both'),
  locationArea: fc.constantFrom('Mumbai', 'Delhi', 'Remote'),
});

const catalogArbitrary = fc
  .array(categoricalRecord, { minLength: 0, maxLength: 20 })
  .map((records) =>
    records.map<ServiceRecord>((record, i) => ({
      id: `S${i + 1}`,
      name: `Service ${i + 1}`,
      description: 'A service used for ranking tests.',
      ...record,
    }))
  );

const preference = {
  businessType: 'Technology',
  priceCategory: 'Low',
  languageSupport: 'Both',
  locationArea: 'Mumbai',
};

describe('Property: Top-N Contract', () => {
  it('should return min(topN, catalog size) results in descending score order', () => {
    fc.assert(
      fc.property(
        catalogArbitrary,
        categoricalRecord,
        fc.constantFrom(...STRATEGY_NAMES),
        fc.integer({ min: 1, max: 25 }),
        (services, wanted, strategy, topN) => {
          const response = rankServices(wanted, services, DEFAULT_ENGINE_CONFIG, { strategy, topN, logger });
          const { recommendations } = response;

          expect(recommendations).toHaveLength(Math.min(topN, services.length));
          recommendations.forEach((result, i) => {
            expect(result.rank).toBe(i + 1);
            expect(result.quality).toBe(classifyQuality(result.score));
            expect(result.explanation.length).toBeGreaterThan(0);
            const next = recommendations[i + 1];
            if (next) {
              expect(result.score).toBeGreaterThanOrEqual(next.score);
            }
          });
          expect(new Set(recommendations.map((r) => r.service.id)).size).toBe(recommendations.length);
        }
      ),
      propertyConfig
    );
  });

  it('should keep a shorter list a prefix of a longer one', () => {
    fc.assert(
      fc.property(catalogArbitrary, fc.integer({ min: 1, max: 10 }), (services, topN) => {
        const short = rankServices(preference, services, DEFAULT_ENGINE_CONFIG, { topN, logger });
        const long = rankServices(preference, services, DEFAULT_ENGINE_CONFIG, { topN: topN + 5, logger });

        expect(long.recommendations.slice(0, short.recommendations.length)).toEqual(short.recommendations);
      }),
      propertyConfig
    );
  });

  it('should reject any topN that is not a positive integer', () => {
    const invalidTopN = fc.oneof(
      fc.integer({ max: 0 }),
      fc.double({ min: 0.01, max: 100, noNaN: true }).filter((n) => !Number.isInteger(n)),
      fc.constant(Number.NaN)
    );

    fc.assert(
      fc.property(invalidTopN, (topN) => {
        expect(() => validateTopN(topN)).toThrow(InvalidArgumentError);
        expect(() => rankServices(preference, [], DEFAULT_ENGINE_CONFIG, { topN, logger })).toThrow(
          InvalidArgumentError
        );
      }),
      propertyConfig
    );
  });

  it('returns an empty list with a warning for an empty catalog', () => {
    const response = rankServices(preference, [], DEFAULT_ENGINE_CONFIG, { logger });

    expect(response.recommendations).toEqual([]);
    expect(response.hasWarning).toBe(true);
    expect(response.warning).toBe('Catalog is empty; no services to rank');
  });

  it('warns when fewer candidates exist than requested', () => {
    const services: ServiceRecord[] = [
      { id: 'S1', name: 'One', description: 'A service used for ranking tests.', ...preference },
    ];
    const response = rankServices(preference, services, DEFAULT_ENGINE_CONFIG, { topN: 3, logger });

    expect(response.recommendations).toHaveLength(1);
    expect(response.warning).toBe('Only 1 candidate service(s) available for topN 3');
  });

  it('rejects an unknown strategy with a configuration error', () => {
    expect(() => rankServices(preference, [], DEFAULT_ENGINE_CONFIG, { strategy: 'random', logger })).toThrow(
      ConfigurationError
    );
  });

  it('rejects a preference with a blank field', () => {
    expect(() =>
      rankServices({ ...preference, locationArea: '   ' }, [], DEFAULT_ENGINE_CONFIG, { logger })
    ).toThrow(PreferenceValidationError);
  });

  it('checks topN before the strategy and the preference', () => {
    expect(() => rankServices({}, [], DEFAULT_ENGINE_CONFIG, { topN: 0, strategy: 'random', logger })).toThrow(
      InvalidArgumentError
    );
  });

  describe('Business type filter', () => {
    const services: ServiceRecord[] = [
      { id: 'S1', name: 'One', description: 'A service used for ranking tests.', ...preference },
      {
        id: 'S2',
        name: 'Two',
        description: 'A service used for ranking tests.',
        ...preference,
        businessType: 'Retail',
      },
    ];
    const config = resolveEngineConfig({ requireBusinessTypeMatch: true });

    it('restricts candidates to the preferred business type', () => {
      const response = rankServices(preference, services, config, { topN: 5, logger });

      expect(response.candidateCount).toBe(1);
      expect(response.filterBypassed).toBe(false);
      expect(response.recommendations.map((r) => r.service.id)).toEqual(['S1']);
    });

    it('should never return a service of another business type while the filter applies', () => {
      fc.assert(
        fc.property(catalogArbitrary, (catalog) => {
          const response = rankServices(preference, catalog, config, { topN: 25, logger });
          if (!response.filterBypassed) {
            for (const result of response.recommendations) {
              expect(result.service.businessType).toBe('Technology');
            }
          }
        }),
        propertyConfig
      );
    });

    it('bypasses the filter when no service matches', () => {
      const response = rankServices({ ...preference, businessType: 'Finance' }, services, config, {
        topN: 5,
        logger,
      });

      expect(response.filterBypassed).toBe(true);
      expect(response.candidateCount).toBe(2);
      expect(response.warning).toBe('No services target Finance; ranking the full catalog');
    });
  });
});
