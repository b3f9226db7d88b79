/**
 * Recommendation Result Models
 *
 * Results are ephemeral: produced per request, ordered by score descending,
 * and discarded once the response is returned. RecommendationExport is the
 * interchange shape shared by the JSON API and the CSV export.
 */

import type { ServiceRecord } from './service.js';

export const QualityTier = {
  HIGH: 'High',
  MEDIUM: 'Medium',
  LOW: 'Low',
} as const;

export type QualityTier = (typeof QualityTier)[keyof typeof QualityTier];

export interface RecommendationResult {
  rank: number;
  service: ServiceRecord;
  score: number;
  quality: QualityTier;
  explanation: string;
}

/**
 * One row of the JSON and CSV export, with the score rounded to two decimals
 */
export interface RecommendationExport {
  service_id: string;
  service_name: string;
  score: number;
  quality: QualityTier;
  explanation: string;
  description: string;
}

/**
 * Column order of the export format
 */
export const EXPORT_COLUMNS = [
  'service_id',
  'service_name',
  'score',
  'quality',
  'explanation',
  'description',
] as const satisfies ReadonlyArray<keyof RecommendationExport>;

/**
 * Rounds a score to two decimals for display
 */
export function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

export function toExportRecord(result: RecommendationResult): RecommendationExport {
  return {
    service_id: result.service.id,
    service_name: result.service.name,
    score: roundScore(result.score),
    quality: result.quality,
    explanation: result.explanation,
    description: result.service.description,
  };
}
