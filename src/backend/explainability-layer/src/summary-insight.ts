/**
 * Summary Insight
 *
 * Aggregate view over one response: counts per tier, average score and a
 * short overall sentence.
 */

import {
  QualityTier,
  roundScore,
  type PreferenceRecord,
  type RecommendationResult,
} from '@service-match/shared';

export interface TopRecommendation {
  serviceId: string;
  serviceName: string;
  score: number;
}

export interface RecommendationSummary {
  total: number;
  averageScore: number;
  qualityDistribution: Record<QualityTier, number>;
  topRecommendation: TopRecommendation | null;
  insight: string;
}

export const STRONG_AVERAGE = 0.8;
export const GOOD_AVERAGE = 0.6;

export function generateSummaryInsight(
  results: readonly RecommendationResult[],
  preference: PreferenceRecord,
  averageScore: number,
  highCount: number
): string {
  if (results.length === 0) {
    return 'No services matched your preferences.';
  }

  const parts: string[] = [];
  if (averageScore >= STRONG_AVERAGE) {
    parts.push('Strong results: these services fit your needs closely.');
  } else if (averageScore >= GOOD_AVERAGE) {
    parts.push('Good results: several services fit your needs well.');
  } else {
    parts.push('These services only partly fit your needs.');
  }

  if (highCount > 0) {
    parts.push(`${highCount} of ${results.length} are high-quality matches.`);
  }

  parts.push(`Ranked against your ${preference.businessType} business profile.`);

  return parts.join(' ');
}

export function summarizeRecommendations(
  results: readonly RecommendationResult[],
  preference: PreferenceRecord
): RecommendationSummary {
  const qualityDistribution: Record<QualityTier, number> = { High: 0, Medium: 0, Low: 0 };
  let scoreSum = 0;

  for (const result of results) {
    qualityDistribution[result.quality] += 1;
    scoreSum += result.score;
  }

  const averageScore = results.length > 0 ? roundScore(scoreSum / results.length) : 0;
  const [top] = results;

  return {
    total: results.length,
    averageScore,
    qualityDistribution,
    topRecommendation: top
      ? { serviceId: top.service.id, serviceName: top.service.name, score: roundScore(top.score) }
      : null,
    insight: generateSummaryInsight(
      results,
      preference,
      averageScore,
      qualityDistribution[QualityTier.HIGH]
    ),
  };
}
