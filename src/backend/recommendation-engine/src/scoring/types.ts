/**
 * Scoring Strategy Types
 *
 * Every strategy scores a preference against a service in [0, 1]. The
 * ranking engine only sees this interface and picks an implementation from
 * the strategy table by name.
 */

import type { EngineConfig, PreferenceRecord, ServiceRecord, StrategyName } from '@service-match/shared';

import type { EncodedService } from '../encoding/encoded-catalog.js';
import type { EncodedVector, EncodingModel } from '../encoding/feature-encoder.js';

export interface ScoreInput {
  preference: PreferenceRecord;
  preferenceVector: EncodedVector;
  service: ServiceRecord;
  serviceVector: EncodedVector;
  model: EncodingModel;
  config: EngineConfig;
}

export interface ScoringStrategy {
  readonly name: StrategyName;

  /**
   * Scores one preference/service pair
   */
  score(input: ScoreInput): number;

  /**
   * Scores every candidate for one request, in candidate order. Strategies may
   * precompute per-request state here.
   */
  scoreCatalog(
    preference: PreferenceRecord,
    candidates: readonly EncodedService[],
    model: EncodingModel,
    config: EngineConfig
  ): number[];
}

/**
 * Clamps a score into [0, 1]; NaN becomes 0
 */
export function clampScore(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
