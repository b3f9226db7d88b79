/**
 * Weighted Categorical Scorer
 *
 * Each field contributes its weight on an exact match of known codes. Price
 * is ordinal, so adjacent tiers earn a configurable share of the weight.
 * Weights are validated to sum to 1.0 before scoring. A match on every field
 * adds the exact-match bonus and the result is clamped.
 *
 * @tested tests/property/scoring-bounds.property.test.ts
 */

import { CATEGORICAL_FIELDS, priceRank, type FieldWeights } from '@service-match/shared';

import { encodeRecord, isUnknownCode } from '../encoding/feature-encoder.js';
import { clampScore, type ScoreInput, type ScoringStrategy } from './types.js';

export interface FieldContribution {
  field: keyof FieldWeights;
  weight: number;
  exact: boolean;
  credit: number;
  contribution: number;
}

/**
 * Per-field credit in [0, 1] and its weighted contribution
 */
export function weightedContributions(input: ScoreInput): FieldContribution[] {
  const { preference, preferenceVector, service, serviceVector, model, config } = input;

  return CATEGORICAL_FIELDS.map((field, index) => {
    const wanted = preferenceVector[index];
    const offered = serviceVector[index];
    const weight = config.weights[field];

    const exact = wanted !== undefined && wanted === offered && !isUnknownCode(model, field, wanted);

    let credit = 0;
    if (exact) {
      credit = 1;
    } else if (field === 'priceCategory') {
      const wantedRank = priceRank(preference.priceCategory);
      const offeredRank = priceRank(service.priceCategory);
      if (wantedRank >= 0 && offeredRank >= 0 && Math.abs(wantedRank - offeredRank) === 1) {
        credit = config.pricePartialCredit;
      }
    }

    return { field, weight, exact, credit, contribution: weight * credit };
  });
}

export function weightedScore(input: ScoreInput): number {
  const contributions = weightedContributions(input);
  let score = contributions.reduce((sum, c) => sum + c.contribution, 0);

  if (contributions.every((c) => c.exact)) {
    score += input.config.exactMatchBonus;
  }

  return clampScore(score);
}

export const weightedStrategy: ScoringStrategy = {
  name: 'weighted',

  score: weightedScore,

  scoreCatalog(preference, candidates, model, config) {
    const preferenceVector = encodeRecord(preference, model);
    return candidates.map((candidate) =>
      weightedScore({
        preference,
        preferenceVector,
        service: candidate.service,
        serviceVector: candidate.vector,
        model,
        config,
      })
    );
  },
};
