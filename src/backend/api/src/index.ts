/**
 * API Layer Entry Point
 *
 * Configures Express with request context, routes, OpenAPI documentation
 * and error handling around a recommendation engine.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import path from 'path';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yamljs';
import { z } from 'zod';

import {
  getLogger,
  loadEngineConfigFromEnv,
  type Logger,
  type MetricsCollector,
} from '@service-match/shared';
import { RecommendationEngine } from '@service-match/recommendation-engine';

import { createErrorHandler, notFoundHandler } from './middleware/error-handler.js';
import { addRequestContext } from './middleware/request-context.js';
import { createCatalogRouter } from './routes/catalog.js';
import { createHealthRouter } from './routes/health.js';
import { createRecommendationsRouter } from './routes/recommendations.js';
import { createServicesRouter } from './routes/services.js';

export const VERSION = '1.0.0';

export interface ApiConfig {
  port: number;
  enableSwagger: boolean;
  catalogPath: string;
  engine?: RecommendationEngine;
  metrics?: MetricsCollector;
  logger?: Logger;
}

export const defaultApiConfig: ApiConfig = {
  port: parseInt(process.env.PORT || '3000', 10),
  enableSwagger: process.env.ENABLE_SWAGGER !== 'false',
  catalogPath: process.env.CATALOG_PATH || 'data/services.csv',
};

const OpenApiDocumentSchema = z.record(z.unknown());

function mountSwagger(app: Express, logger: Logger): void {
  const openapiPath = path.join(process.cwd(), 'src/backend/api/src/openapi.yaml');
  try {
    const parsed = OpenApiDocumentSchema.safeParse(YAML.load(openapiPath));
    if (!parsed.success) {
      logger.warn('OpenAPI document is not an object', { openapiPath });
      return;
    }
    const swaggerDocument = parsed.data;
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument));
    app.get('/api-docs.json', (_req: Request, res: Response) => {
      res.json(swaggerDocument);
    });
  } catch (error) {
    logger.warn('Failed to load OpenAPI document', {
      openapiPath,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Creates and configures the Express application
 */
export function createApp(config: Partial<ApiConfig> = {}): Express {
  const fullConfig: ApiConfig = { ...defaultApiConfig, ...config };
  const logger = fullConfig.logger ?? getLogger();
  const engine =
    fullConfig.engine ??
    new RecommendationEngine([], {
      config: loadEngineConfigFromEnv(),
      logger,
      metrics: fullConfig.metrics,
    });

  const app = express();

  app.use(express.json());
  app.use(addRequestContext);

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Correlation-ID');
    next();
  });

  app.options('*', (_req: Request, res: Response) => {
    res.sendStatus(204);
  });

  app.use(createHealthRouter(engine, { version: VERSION }));

  if (fullConfig.enableSwagger) {
    mountSwagger(app, logger);
  }

  const apiRouter = express.Router();
  apiRouter.use('/recommendations', createRecommendationsRouter(engine));
  apiRouter.use('/services', createServicesRouter(engine));
  apiRouter.use('/catalog', createCatalogRouter(engine));
  app.use('/api/v1', apiRouter);

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Starts the API server
 */
export function startServer(config: Partial<ApiConfig> = {}): void {
  const fullConfig: ApiConfig = { ...defaultApiConfig, ...config };
  const logger = fullConfig.logger ?? getLogger();
  const app = createApp(fullConfig);

  app.listen(fullConfig.port, () => {
    logger.info('API server listening', {
      port: fullConfig.port,
      docs: fullConfig.enableSwagger ? `http://localhost:${fullConfig.port}/api-docs` : undefined,
    });
  });
}

export { createRecommendationsRouter, RecommendationRequestSchema } from './routes/recommendations.js';
export { createServicesRouter, ExplanationRequestSchema } from './routes/services.js';
export { createCatalogRouter } from './routes/catalog.js';
export { createHealthRouter, HealthCheckService, HealthStatus } from './routes/health.js';
export { escapeCsvField, toCsv } from './export/csv-writer.js';
export * from './middleware/index.js';
