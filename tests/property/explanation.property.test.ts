/**
 * Property: Explanation Consistency
 *
 * Explanations are deterministic, open with a sentence from the template set
 * of the result's tier, and never describe a Low match as strong.
 *
 * @file src/backend/explainability-layer/src/explanation-generator.ts
 * @file src/backend/explainability-layer/src/field-comparator.ts
 * @file src/backend/explainability-layer/src/summary-insight.ts
 */

import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  QualityTier,
  type RecommendationResult,
  type ServiceRecord,
} from '../../src/backend/shared/src/index.js';
import {
  FieldVerdict,
  OPENING_TEMPLATES,
  TemplateKey,
  compareField,
  compareFields,
  countVerdicts,
  explain,
  explainMatch,
  fnv1a,
  generateHighlights,
  isPerfectMatch,
  joinList,
  selectOpening,
  summarizeDescription,
  summarizeRecommendations,
} from '../../src/backend/explainability-layer/src/index.js';
import { classifyQuality } from '../../src/backend/recommendation-engine/src/index.js';

const propertyConfig = {
  numRuns: 100,
  verbose: false,
};

const categoricalRecord = fc.record({
  businessType: fc.constantFrom('Retail', 'Technology', 'Healthcare'),
  priceCategory: fc.constantFrom('Low', 'Medium', 'High', 'Unknown'),
  languageSupport: fc.constantFrom('Hindi', 'English', 'Both'),
  locationArea: fc.constantFrom('Mumbai', 'Delhi', 'Remote'),
});

const serviceArbitrary: fc.Arbitrary<ServiceRecord> = fc
  .tuple(categoricalRecord, fc.string({ minLength: 1, maxLength: 8 }), fc.lorem({ maxCount: 40 }))
  .map(([record, id, description]) => ({
    id: `S-${id}`,
    name: 'Generated Service',
    description: description.length > 0 ? description : 'Fallback description.',
    ...record,
  }));

const preference = {
  businessType: 'Technology',
  priceCategory: 'Low',
  languageSupport: 'Both',
  locationArea: 'Mumbai',
};

function createService(id: string, overrides: Partial<ServiceRecord> = {}): ServiceRecord {
  return {
    id,
    name: `Service ${id}`,
    ...preference,
    description: 'A service used for explanation tests.',
    ...overrides,
  };
}

describe('Property: Explanation Consistency', () => {
  describe('Template selection', () => {
    it('should open with a sentence from the tier template set', () => {
      fc.assert(
        fc.property(categoricalRecord, serviceArbitrary, fc.double({ min: 0, max: 1, noNaN: true }), (wanted, service, score) => {
          const quality = classifyQuality(score);
          const match = explainMatch(wanted, service, score, quality);

          expect(OPENING_TEMPLATES[match.templateKey]).toContain(match.opening);
          expect(match.text.startsWith(match.opening)).toBe(true);
          if (quality === QualityTier.LOW) {
            expect(match.templateKey).toBe(TemplateKey.LOW);
          }
          if (quality === QualityTier.MEDIUM) {
            expect(match.templateKey).toBe(TemplateKey.MEDIUM);
          }
        }),
        propertyConfig
      );
    });

    it('should produce the same text for the same inputs', () => {
      fc.assert(
        fc.property(categoricalRecord, serviceArbitrary, fc.double({ min: 0, max: 1, noNaN: true }), (wanted, service, score) => {
          const quality = classifyQuality(score);
          expect(explain(wanted, service, score, quality)).toBe(explain(wanted, service, score, quality));
        }),
        propertyConfig
      );
    });

    it('uses the perfect set only for a High result matching every field', () => {
      const service = createService('A');
      expect(explainMatch(preference, service, 1, QualityTier.HIGH).templateKey).toBe(TemplateKey.PERFECT);
      expect(explainMatch(preference, service, 0.6, QualityTier.MEDIUM).templateKey).toBe(TemplateKey.MEDIUM);

      const remote = createService('B', { locationArea: 'Remote' });
      expect(explainMatch(preference, remote, 0.8, QualityTier.HIGH).templateKey).toBe(TemplateKey.HIGH);
    });

    it('picks the opening by hashing id, tier and score', () => {
      expect(fnv1a('')).toBe(2166136261);
      expect(fnv1a('a')).toBe(3826002220);
      // fnv1a('A|High|1.0000') % 3 === 1
      expect(selectOpening(TemplateKey.PERFECT, 'A', QualityTier.HIGH, 1)).toBe(
        'Every one of your requirements is covered by this service.'
      );
      // fnv1a('C|Low|0.0000') % 3 === 0
      expect(selectOpening(TemplateKey.LOW, 'C', QualityTier.LOW, 0)).toBe(
        'A possible alternative, though it only partly fits your needs.'
      );
    });
  });

  describe('Explanation text', () => {
    it('lists every matched field for a perfect match', () => {
      const service = createService('A', { description: 'Managed IT support for small offices' });

      expect(explain(preference, service, 1, QualityTier.HIGH)).toBe(
        'Every one of your requirements is covered by this service. ' +
          'Matches your business type, price tier, language support, and location. ' +
          'Managed IT support for small offices. ' +
          'Highlights: cost-effective option, bilingual support, local service in Mumbai.'
      );
    });

    it('describes partial and mismatched fields', () => {
      const service = createService('B', {
        languageSupport: 'English',
        locationArea: 'Remote',
        description: 'Remote help desk for software teams.',
      });

      // fnv1a('B|Medium|0.6000') % 3 === 2
      expect(explain(preference, service, 0.6, QualityTier.MEDIUM)).toBe(
        'Worth a look: it meets a good part of your brief. ' +
          'Matches your business type and price tier. ' +
          'Close on the rest: it is delivered remotely. ' +
          'Differs on language support (English). ' +
          'Remote help desk for software teams. ' +
          'Highlights: cost-effective option, remote delivery.'
      );
    });

    it('keeps Low explanations modest', () => {
      const service = createService('B', {
        languageSupport: 'English',
        locationArea: 'Remote',
        description: 'Remote help desk for software teams.',
      });

      // fnv1a('B|Low|0.2929') % 3 === 2
      const text = explain(preference, service, 1 - 2 / Math.sqrt(8), QualityTier.LOW);
      expect(text.startsWith('A weaker match that could still be relevant. It only matches your business type and price tier.')).toBe(
        true
      );
    });

    it('lists every difference when nothing matches', () => {
      const service = createService('C', {
        businessType: 'Retail',
        priceCategory: 'High',
        languageSupport: 'Hindi',
        locationArea: 'Delhi',
        description: 'Store fixtures and shelving.',
      });

      expect(explain(preference, service, 0, QualityTier.LOW)).toBe(
        'A possible alternative, though it only partly fits your needs. ' +
          'Differs on business type (Retail), price tier (High), language support (Hindi), and location (Delhi). ' +
          'Store fixtures and shelving. ' +
          'Highlights: premium service.'
      );
    });

    it('names a single matched field with its value', () => {
      const service = createService('D', {
        priceCategory: 'High',
        languageSupport: 'Hindi',
        locationArea: 'Delhi',
      });
      const match = explainMatch(preference, service, 0.35, QualityTier.LOW);

      expect(match.text).toContain('It only matches your business type (Technology).');
    });

    it('notes an adjacent price tier', () => {
      const service = createService('E', { priceCategory: 'Medium' });
      const match = explainMatch(preference, service, 0.875, QualityTier.HIGH);

      expect(match.text).toContain(
        'Close on the rest: its Medium price tier is one step from your Low budget.'
      );
    });
  });

  describe('Field comparison', () => {
    it.each([
      ['priceCategory', 'Low', 'Medium', FieldVerdict.PARTIAL],
      ['priceCategory', 'Low', 'High', FieldVerdict.MISMATCH],
      ['priceCategory', 'Unknown', 'Unknown', FieldVerdict.MISMATCH],
      ['languageSupport', 'Hindi', 'Both', FieldVerdict.PARTIAL],
      ['languageSupport', 'Both', 'Hindi', FieldVerdict.MISMATCH],
      ['locationArea', 'Pune', 'Online', FieldVerdict.PARTIAL],
      ['businessType', 'real estate', 'Real Estate', FieldVerdict.EXACT],
    ] as const)('compares %s %s against %s as %s', (field, wanted, offered, verdict) => {
      expect(compareField(field, wanted, offered).verdict).toBe(verdict);
    });

    it('should report a perfect match exactly when every verdict is exact', () => {
      fc.assert(
        fc.property(categoricalRecord, serviceArbitrary, (wanted, service) => {
          const comparisons = compareFields(wanted, service);
          const counts = countVerdicts(comparisons);

          expect(counts.exact + counts.partial + counts.mismatch).toBe(4);
          expect(isPerfectMatch(comparisons)).toBe(counts.exact === 4);
        }),
        propertyConfig
      );
    });
  });

  describe('Helpers', () => {
    it('joins lists in prose', () => {
      expect(joinList([])).toBe('');
      expect(joinList(['a'])).toBe('a');
      expect(joinList(['a', 'b'])).toBe('a and b');
      expect(joinList(['a', 'b', 'c'])).toBe('a, b, and c');
    });

    it('shortens long descriptions at a word boundary', () => {
      expect(summarizeDescription('Short text')).toBe('Short text.');
      expect(summarizeDescription('Ends here!')).toBe('Ends here!');
      expect(summarizeDescription(Array(30).fill('word').join(' '))).toBe(`${Array(20).fill('word').join(' ')}...`);
      expect(summarizeDescription('alpha beta, gamma', 12)).toBe('alpha beta...');
      expect(summarizeDescription('x'.repeat(120))).toBe(`${'x'.repeat(100)}...`);
    });

    it('derives highlights from the service attributes', () => {
      expect(generateHighlights(preference, createService('F'))).toEqual([
        'cost-effective option',
        'bilingual support',
        'local service in Mumbai',
      ]);
      expect(
        generateHighlights(preference, createService('G', { priceCategory: 'Medium', languageSupport: 'Hindi', locationArea: 'Pune' }))
      ).toEqual([]);
    });
  });

  describe('Summary insight', () => {
    const result = (service: ServiceRecord, rank: number, score: number): RecommendationResult => ({
      rank,
      service,
      score,
      quality: classifyQuality(score),
      explanation: 'Generated for summary tests.',
    });

    it('summarizes tiers, average and the top result', () => {
      const results = [result(createService('A'), 1, 1), result(createService('B'), 2, 0.6)];

      expect(summarizeRecommendations(results, preference)).toEqual({
        total: 2,
        averageScore: 0.8,
        qualityDistribution: { High: 1, Medium: 1, Low: 0 },
        topRecommendation: { serviceId: 'A', serviceName: 'Service A', score: 1 },
        insight:
          'Strong results: these services fit your needs closely. 1 of 2 are high-quality matches. ' +
          'Ranked against your Technology business profile.',
      });
    });

    it('reports weak results without claiming high quality', () => {
      const summary = summarizeRecommendations([result(createService('C'), 1, 0.3)], {
        ...preference,
        businessType: 'Retail',
      });

      expect(summary.insight).toBe('These services only partly fit your needs. Ranked against your Retail business profile.');
    });

    it('handles an empty result list', () => {
      expect(summarizeRecommendations([], preference)).toEqual({
        total: 0,
        averageScore: 0,
        qualityDistribution: { High: 0, Medium: 0, Low: 0 },
        topRecommendation: null,
        insight: 'No services matched your preferences.',
      });
    });
  });
});
