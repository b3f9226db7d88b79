/**
 * Match Quality Classifier
 *
 * Maps a score onto a quality tier using the configured lower bounds.
 * Monotonic: a higher score never lands in a lower tier.
 *
 * @tested tests/property/quality-monotonic.property.test.ts
 */

import {
  DEFAULT_QUALITY_THRESHOLDS,
  QualityTier,
  type QualityThresholds,
} from '@service-match/shared';

const TIER_RANK: Record<QualityTier, number> = {
  Low: 0,
  Medium: 1,
  High: 2,
};

export function classifyQuality(
  score: number,
  thresholds: QualityThresholds = DEFAULT_QUALITY_THRESHOLDS
): QualityTier {
  if (score >= thresholds.high) {
    return QualityTier.HIGH;
  }
  if (score >= thresholds.medium) {
    return QualityTier.MEDIUM;
  }
  return QualityTier.LOW;
}

/**
 * Ordinal position of a tier (Low = 0)
 */
export function tierRank(tier: QualityTier): number {
  return TIER_RANK[tier];
}

/**
 * Comparator ordering tiers from highest to lowest
 */
export function compareTiers(a: QualityTier, b: QualityTier): number {
  return tierRank(b) - tierRank(a);
}
