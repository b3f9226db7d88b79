/**
 * Service Explanation Endpoint
 *
 * POST /api/v1/services/:serviceId/explanation scores one catalog service
 * against a preference and returns its tier, explanation and field-by-field
 * comparison.
 */

import { Router, type Response } from 'express';
import { z } from 'zod';

import {
  PreferenceRecordSchema,
  StrategyNameSchema,
  formatValidationErrors,
  roundScore,
} from '@service-match/shared';
import type { RecommendationEngine } from '@service-match/recommendation-engine';

import { createErrorResponse } from '../middleware/error-handler.js';
import { getRequestContext, type ContextualRequest } from '../middleware/request-context.js';

export const ExplanationRequestSchema = z.object({
  preference: PreferenceRecordSchema,
  strategy: StrategyNameSchema.optional(),
});

export function createServicesRouter(engine: RecommendationEngine): Router {
  const router = Router();

  router.post('/:serviceId/explanation', (req: ContextualRequest, res: Response): void => {
    const context = getRequestContext(req);
    const validationResult = ExplanationRequestSchema.safeParse(req.body);
    if (!validationResult.success) {
      res
        .status(400)
        .json(
          createErrorResponse(
            'ValidationError',
            'Request validation failed',
            context.correlationId,
            formatValidationErrors(validationResult.error)
          )
        );
      return;
    }

    const { preference, strategy } = validationResult.data;
    const result = engine.explainRecommendation(req.params.serviceId, preference, strategy);

    res.status(200).json({
      requestId: context.requestId,
      correlationId: context.correlationId,
      serviceId: result.service.id,
      serviceName: result.service.name,
      strategy: result.strategy,
      score: roundScore(result.score),
      quality: result.quality,
      explanation: result.explanation,
      comparisons: result.comparisons,
    });
  });

  return router;
}
