/**
 * Health Check Endpoints
 *
 * Liveness and readiness probes. The service is ready once a non-empty
 * catalog has been encoded; with an empty catalog it still answers requests
 * but reports itself degraded.
 *
 * @tested tests/integration/api-endpoints.integration.test.ts
 */

import { Router, type Request, type Response } from 'express';

import type { RecommendationEngine } from '@service-match/recommendation-engine';

export const HealthStatus = {
  HEALTHY: 'healthy',
  DEGRADED: 'degraded',
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface HealthCheckResponse {
  status: HealthStatus;
  version: string;
  timestamp: string;
  uptime: number;
  catalog: {
    version: number;
    size: number;
    builtAt: string;
  };
}

export interface HealthCheckConfig {
  version: string;
  startTime: Date;
}

export class HealthCheckService {
  private readonly config: HealthCheckConfig;

  constructor(
    private readonly engine: RecommendationEngine,
    config: Partial<HealthCheckConfig> = {}
  ) {
    this.config = { version: '1.0.0', startTime: new Date(), ...config };
  }

  /**
   * Uptime in whole seconds
   */
  getUptime(): number {
    return Math.floor((Date.now() - this.config.startTime.getTime()) / 1000);
  }

  isReady(): boolean {
    return this.engine.catalog().services.length > 0;
  }

  checkHealth(): HealthCheckResponse {
    const catalog = this.engine.catalog();
    return {
      status: catalog.services.length > 0 ? HealthStatus.HEALTHY : HealthStatus.DEGRADED,
      version: this.config.version,
      timestamp: new Date().toISOString(),
      uptime: this.getUptime(),
      catalog: {
        version: catalog.version,
        size: catalog.services.length,
        builtAt: catalog.builtAt,
      },
    };
  }
}

/**
 * Mounted at the root: /health, /ready and /live
 */
export function createHealthRouter(
  engine: RecommendationEngine,
  config: Partial<HealthCheckConfig> = {}
): Router {
  const router = Router();
  const healthService = new HealthCheckService(engine, config);

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json(healthService.checkHealth());
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const ready = healthService.isReady();
    res.status(ready ? 200 : 503).json({
      ready,
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      alive: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
