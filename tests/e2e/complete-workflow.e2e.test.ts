/**
 * E2E Tests for Complete Workflow
 *
 * Loads the bundled sample catalog, cleans and encodes it, ranks services
 * for a preference, explains the top result and exports the list as CSV,
 * both through the library and through the HTTP API.
 */

import path from 'path';
import { beforeAll, describe, expect, it } from 'vitest';
import request from 'supertest';

import {
  EXPORT_COLUMNS,
  QualityTier,
  createLogger,
  toExportRecord,
  type ServiceRecord,
} from '../../src/backend/shared/src/index.js';
import { loadCatalogFile, parseCsvRecords } from '../../src/backend/catalog-preprocessing/src/index.js';
import { RecommendationEngine } from '../../src/backend/recommendation-engine/src/index.js';
import { createApp, toCsv } from '../../src/backend/api/src/index.js';

const logger = createLogger({ enableConsole: false });

const preference = {
  businessType: 'Retail',
  priceCategory: 'Low',
  languageSupport: 'Hindi',
  locationArea: 'Mumbai',
};

describe('E2E: Complete Workflow', () => {
  let services: ServiceRecord[];
  let engine: RecommendationEngine;

  beforeAll(async () => {
    const loaded = await loadCatalogFile(path.join(process.cwd(), 'data/services.csv'), logger);
    services = loaded.services;
    engine = new RecommendationEngine(services, { logger });
  });

  it('ranks the exact catalog match first under every strategy', () => {
    for (const strategy of ['weighted', 'cosine', 'knn'] as const) {
      const [top] = engine.getRecommendations(preference, { strategy });

      expect(top?.service.id).toBe('SRV_0001');
      expect(top?.score).toBe(1);
      expect(top?.quality).toBe(QualityTier.HIGH);
    }
  });

  it('returns topN results from the catalog in non-increasing score order', () => {
    const results = engine.getRecommendations(preference);
    const ids = new Set(services.map((s) => s.id));

    expect(results).toHaveLength(3);
    expect(results.map((r) => r.rank)).toEqual([1, 2, 3]);
    for (let i = 0; i < results.length; i++) {
      expect(ids.has(results[i]?.service.id ?? '')).toBe(true);
      if (i > 0) {
        expect(results[i]?.score ?? 0).toBeLessThanOrEqual(results[i - 1]?.score ?? 0);
      }
    }
  });

  it('gives the same explanation for a service as the ranked list does', () => {
    const [top] = engine.getRecommendations(preference);
    const explained = engine.explainRecommendation('SRV_0001', preference);

    // fnv1a('SRV_0001|High|1.0000') % 3 === 0
    expect(explained.explanation.startsWith('A complete match for everything you asked for.')).toBe(true);
    expect(explained.explanation).toContain('Matches your business type, price tier, language support, and location.');
    expect(explained.explanation).toBe(top?.explanation);
  });

  it('exports a CSV that parses back into the same rows', () => {
    const rows = engine.getRecommendations(preference).map(toExportRecord);
    const records = parseCsvRecords(toCsv(rows));

    expect(records[0]).toEqual([...EXPORT_COLUMNS]);
    expect(records).toHaveLength(4);
    expect(records[1]).toEqual([
      'SRV_0001',
      'Shelf Display Design',
      '1.00',
      'High',
      rows[0]?.explanation,
      'In-store shelf layouts and window displays for small shops, planned around footfall.',
    ]);
  });

  it('serves the same ranking over HTTP', async () => {
    const app = createApp({ engine, logger, enableSwagger: false });

    const ranked = await request(app)
      .post('/api/v1/recommendations')
      .set('X-Correlation-ID', 'e2e-workflow')
      .send({ preference });

    expect(ranked.status).toBe(200);
    expect(ranked.body.correlationId).toBe('e2e-workflow');
    expect(ranked.body.recommendations.map((r: { service_id: string }) => r.service_id)).toEqual(
      engine.getRecommendations(preference).map((r) => r.service.id)
    );

    const explained = await request(app).post('/api/v1/services/SRV_0001/explanation').send({ preference });
    expect(explained.status).toBe(200);
    expect(explained.body.explanation).toBe(ranked.body.recommendations[0].explanation);

    const exported = await request(app).post('/api/v1/recommendations/export').send({ preference, topN: 1 });
    expect(exported.status).toBe(200);
    expect(exported.text.split('\r\n')[1]?.startsWith('SRV_0001,Shelf Display Design,1.00,High,')).toBe(true);
  });

  it('reloads the catalog and ranks against the new services', async () => {
    const reloaded = await loadCatalogFile(path.join(process.cwd(), 'tests/fixtures/services.json'), logger);
    const local = new RecommendationEngine(services, { logger });

    local.reloadCatalog(reloaded.services, reloaded.report);

    const [top] = local.getRecommendations(
      { businessType: 'Finance', priceCategory: 'Low', languageSupport: 'Both', locationArea: 'Pune' },
      { topN: 1 }
    );
    expect(local.catalog().version).toBe(2);
    expect(local.getStatistics().cleaningReport).toEqual(reloaded.report);
    expect(top?.service.id).toBe('101');
    expect(top?.service.name).toBe('Tax Filing Help');
  });
});
