/**
 * Cosine Similarity Scorer
 *
 * Cosine similarity of one-hot metric vectors. Unknown slots count toward a
 * vector's length but are masked out of the dot product, so an unknown value
 * lowers the score like a mismatch instead of agreeing with another unknown.
 *
 * @tested tests/property/scoring-bounds.property.test.ts
 */

import {
  encodeRecord,
  knownSlotMask,
  toMetricVector,
  type MetricVector,
} from '../encoding/feature-encoder.js';
import { clampScore, type ScoreInput, type ScoringStrategy } from './types.js';

function norm(vector: MetricVector): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * Masked cosine similarity; zero-length vectors score 0
 */
export function cosineSimilarity(a: MetricVector, b: MetricVector, mask: MetricVector): number {
  const lengthA = norm(a);
  const lengthB = norm(b);
  if (lengthA === 0 || lengthB === 0) {
    return 0;
  }

  let dot = 0;
  for (let i = 0; i < a.length; i++) {
    dot += (a[i] ?? 0) * (b[i] ?? 0) * (mask[i] ?? 0);
  }

  return clampScore(dot / (lengthA * lengthB));
}

export function cosineScore(input: ScoreInput): number {
  const { preferenceVector, serviceVector, model } = input;
  return cosineSimilarity(
    toMetricVector(preferenceVector, model),
    toMetricVector(serviceVector, model),
    knownSlotMask(model)
  );
}

export const cosineStrategy: ScoringStrategy = {
  name: 'cosine',

  score: cosineScore,

  scoreCatalog(preference, candidates, model) {
    const preferenceMetric = toMetricVector(encodeRecord(preference, model), model);
    const mask = knownSlotMask(model);
    return candidates.map((candidate) => cosineSimilarity(preferenceMetric, candidate.metricVector, mask));
  },
};
