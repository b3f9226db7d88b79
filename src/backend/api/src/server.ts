/**
 * Server bootstrap: loads and cleans the catalog file, builds the engine and
 * starts listening.
 */

import { loadCatalogFile } from '@service-match/catalog-preprocessing';
import { RecommendationEngine } from '@service-match/recommendation-engine';
import { createMetricsCollector, getLogger, loadEngineConfigFromEnv } from '@service-match/shared';

import { defaultApiConfig, startServer } from './index.js';

const logger = getLogger();

async function main(): Promise<void> {
  const config = loadEngineConfigFromEnv();
  const metrics = createMetricsCollector();
  const { services, report } = await loadCatalogFile(defaultApiConfig.catalogPath, logger);

  logger.info('Catalog loaded', {
    catalogPath: defaultApiConfig.catalogPath,
    services: services.length,
    recordsRemoved: report.recordsRemoved,
  });

  const engine = new RecommendationEngine(services, {
    config,
    logger,
    metrics,
    cleaningReport: report,
  });
  startServer({ engine, metrics, logger });
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', error instanceof Error ? error : new Error(String(error)));
  process.exitCode = 1;
});
