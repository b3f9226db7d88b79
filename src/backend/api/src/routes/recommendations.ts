/**
 * Recommendation API Endpoints
 *
 * POST /api/v1/recommendations returns ranked, tiered and explained services
 * for a preference. POST /api/v1/recommendations/export returns the same rows
 * as CSV. Request bodies are validated with Zod before reaching the engine.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Response } from 'express';
import { z } from 'zod';

import {
  PreferenceRecordSchema,
  StrategyNameSchema,
  formatValidationErrors,
  toExportRecord,
  type RecommendationExport,
} from '@service-match/shared';
import type { RecommendationSummary } from '@service-match/explainability-layer';
import type { RecommendationEngine } from '@service-match/recommendation-engine';

import { toCsv } from '../export/csv-writer.js';
import { createErrorResponse } from '../middleware/error-handler.js';
import { getRequestContext, type ContextualRequest } from '../middleware/request-context.js';

/**
 * topN is only checked for being a number here; the engine rejects
 * non-positive and fractional values with InvalidArgument
 */
export const RecommendationRequestSchema = z.object({
  preference: PreferenceRecordSchema,
  topN: z.number().optional(),
  strategy: StrategyNameSchema.optional(),
});

export type RecommendationRequest = z.infer<typeof RecommendationRequestSchema>;

export interface RecommendationResponse {
  requestId: string;
  correlationId: string;
  strategy: string;
  filterBypassed: boolean;
  warning?: string;
  recommendations: RecommendationExport[];
  summary: RecommendationSummary;
  processingTimeMs: number;
}

export const EXPORT_FILENAME = 'recommendations.csv';

function parseRequest(req: ContextualRequest, res: Response): RecommendationRequest | undefined {
  const validationResult = RecommendationRequestSchema.safeParse(req.body);
  if (!validationResult.success) {
    res
      .status(400)
      .json(
        createErrorResponse(
          'ValidationError',
          'Request validation failed',
          getRequestContext(req).correlationId,
          formatValidationErrors(validationResult.error)
        )
      );
    return undefined;
  }
  return validationResult.data;
}

export function createRecommendationsRouter(engine: RecommendationEngine): Router {
  const router = Router();

  /**
   * POST /api/v1/recommendations
   */
  router.post('/', (req: ContextualRequest, res: Response): void => {
    const context = getRequestContext(req);
    const request = parseRequest(req, res);
    if (!request) {
      return;
    }

    const ranking = engine.rankServices(request.preference, {
      topN: request.topN,
      strategy: request.strategy,
      correlationId: context.correlationId,
    });

    const response: RecommendationResponse = {
      requestId: context.requestId,
      correlationId: context.correlationId,
      strategy: ranking.strategy,
      filterBypassed: ranking.filterBypassed,
      warning: ranking.warning,
      recommendations: ranking.recommendations.map(toExportRecord),
      summary: engine.summarize(ranking.recommendations, ranking.preference),
      processingTimeMs: Date.now() - context.startTime,
    };

    res.status(200).json(response);
  });

  /**
   * POST /api/v1/recommendations/export
   */
  router.post('/export', (req: ContextualRequest, res: Response): void => {
    const context = getRequestContext(req);
    const request = parseRequest(req, res);
    if (!request) {
      return;
    }

    const recommendations = engine.getRecommendations(request.preference, {
      topN: request.topN,
      strategy: request.strategy,
      correlationId: context.correlationId,
    });

    res
      .status(200)
      .attachment(EXPORT_FILENAME)
      .type('text/csv')
      .send(toCsv(recommendations.map(toExportRecord)));
  });

  return router;
}
