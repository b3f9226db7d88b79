/**
 * Catalog Endpoints
 */

import { Router, type Request, type Response } from 'express';

import type { RecommendationEngine } from '@service-match/recommendation-engine';

export function createCatalogRouter(engine: RecommendationEngine): Router {
  const router = Router();

  /**
   * GET /api/v1/catalog/statistics
   */
  router.get('/statistics', (_req: Request, res: Response): void => {
    res.status(200).json(engine.getStatistics());
  });

  return router;
}
