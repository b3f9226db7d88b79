/**
 * Encoded Catalog
 *
 * The catalog with its encoding model and per-service vectors, built once per
 * dataset load. Snapshots are frozen; CatalogStore replaces the whole
 * snapshot on reload so a request holding the previous one keeps a
 * consistent view.
 *
 * @tested tests/integration/recommendation-engine.integration.test.ts
 */

import {
  CatalogValidationError,
  formatValidationErrors,
  safeValidateServiceCatalog,
  type CleaningReport,
  type ServiceRecord,
} from '@service-match/shared';

import {
  encodeRecord,
  fitEncoder,
  toMetricVector,
  type EncodedVector,
  type EncodingModel,
  type MetricVector,
} from './feature-encoder.js';

export interface EncodedService {
  /** Position in the catalog; the ranking tie-break */
  readonly index: number;
  readonly service: ServiceRecord;
  readonly vector: EncodedVector;
  readonly metricVector: MetricVector;
}

export interface EncodedCatalog {
  readonly version: number;
  readonly builtAt: string;
  readonly model: EncodingModel;
  readonly services: readonly EncodedService[];
  /** Report of the cleaning run that produced these services, when known */
  readonly cleaningReport: Readonly<CleaningReport> | null;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const nested: unknown[] = Object.values(value);
    nested.forEach(deepFreeze);
  }
  return value;
}

/**
 * Validates, fits and encodes a catalog
 *
 * @throws CatalogValidationError for malformed records or duplicate ids
 */
export function buildEncodedCatalog(
  services: readonly ServiceRecord[],
  version = 1,
  cleaningReport?: CleaningReport
): EncodedCatalog {
  const validation = safeValidateServiceCatalog(services);
  if (!validation.success) {
    throw new CatalogValidationError('Service catalog is invalid', formatValidationErrors(validation.error));
  }

  const records = validation.data;
  const model = fitEncoder(records);

  const encoded: EncodedService[] = records.map((service, index) => {
    const vector = encodeRecord(service, model);
    return { index, service, vector, metricVector: toMetricVector(vector, model) };
  });

  return deepFreeze({
    version,
    builtAt: new Date().toISOString(),
    model,
    services: encoded,
    cleaningReport: cleaningReport ? { ...cleaningReport } : null,
  });
}

/**
 * Holds the current catalog snapshot
 */
export class CatalogStore {
  private snapshot: EncodedCatalog;

  constructor(services: readonly ServiceRecord[] = [], cleaningReport?: CleaningReport) {
    this.snapshot = buildEncodedCatalog(services, 1, cleaningReport);
  }

  current(): EncodedCatalog {
    return this.snapshot;
  }

  get size(): number {
    return this.snapshot.services.length;
  }

  /**
   * Builds a complete new snapshot, then swaps it in. A failed build leaves
   * the current snapshot in place.
   */
  reload(services: readonly ServiceRecord[], cleaningReport?: CleaningReport): EncodedCatalog {
    const next = buildEncodedCatalog(services, this.snapshot.version + 1, cleaningReport);
    this.snapshot = next;
    return next;
  }
}
