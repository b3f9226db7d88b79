/**
 * K-Nearest-Neighbor Scorer
 *
 * Euclidean distance between one-hot metric vectors, mapped to
 * score = 1 - distance / maxDistance and clamped to [0, 1]. A field where
 * either side is unknown counts as a full mismatch (squared distance 2).
 * scoreCatalog computes the distance set once per request.
 *
 * @tested tests/property/scoring-bounds.property.test.ts
 */

import { CATEGORICAL_FIELDS, type EngineConfig } from '@service-match/shared';

import {
  encodeRecord,
  knownSlotMask,
  toMetricVector,
  type MetricVector,
} from '../encoding/feature-encoder.js';
import { clampScore, type ScoreInput, type ScoringStrategy } from './types.js';

/**
 * Largest distance two metric vectors can have: every field mismatched
 */
export const DEFAULT_KNN_MAX_DISTANCE = Math.sqrt(2 * CATEGORICAL_FIELDS.length);

export function resolveMaxDistance(config: EngineConfig): number {
  return config.knnMaxDistance ?? DEFAULT_KNN_MAX_DISTANCE;
}

/**
 * Euclidean distance where a shared unknown slot still counts as a mismatch
 */
export function metricDistance(a: MetricVector, b: MetricVector, mask: MetricVector): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    const diff = x - y;
    sum += diff * diff;
    if ((mask[i] ?? 0) === 0) {
      sum += 2 * x * y;
    }
  }
  return Math.sqrt(sum);
}

export function distanceToScore(distance: number, maxDistance: number): number {
  if (maxDistance <= 0) {
    return distance === 0 ? 1 : 0;
  }
  return clampScore(1 - distance / maxDistance);
}

/**
 * Distances from one preference vector to every candidate, in order
 */
export function computeDistances(
  preferenceMetric: MetricVector,
  candidateMetrics: readonly MetricVector[],
  mask: MetricVector
): number[] {
  return candidateMetrics.map((metric) => metricDistance(preferenceMetric, metric, mask));
}

export function knnScore(input: ScoreInput): number {
  const { preferenceVector, serviceVector, model, config } = input;
  const distance = metricDistance(
    toMetricVector(preferenceVector, model),
    toMetricVector(serviceVector, model),
    knownSlotMask(model)
  );
  return distanceToScore(distance, resolveMaxDistance(config));
}

export const knnStrategy: ScoringStrategy = {
  name: 'knn',

  score: knnScore,

  scoreCatalog(preference, candidates, model, config) {
    const preferenceMetric = toMetricVector(encodeRecord(preference, model), model);
    const distances = computeDistances(
      preferenceMetric,
      candidates.map((candidate) => candidate.metricVector),
      knownSlotMask(model)
    );
    const maxDistance = resolveMaxDistance(config);
    return distances.map((distance) => distanceToScore(distance, maxDistance));
  },
};
