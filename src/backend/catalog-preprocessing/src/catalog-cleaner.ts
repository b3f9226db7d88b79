/**
 * Catalog Cleaner
 *
 * Turns raw dataset rows into validated service records. Steps run in a fixed
 * order: de-duplication, imputation, text cleanup, category standardization,
 * then removal of records that still fail the quality bar or the record
 * schema's length limits.
 *
 * @tested tests/integration/catalog-preprocessing.integration.test.ts
 */

import {
  CatalogValidationError,
  LANGUAGE_OPTIONS,
  PRICE_CATEGORIES,
  ServiceRecordSchema,
  UNKNOWN_CATEGORY,
  formatValidationErrors,
  getLogger,
  safeValidateServiceCatalog,
  standardizeCategory,
  toTitleCase,
  type CategoricalField,
  type CleaningReport,
  type Logger,
  type ServiceRecord,
} from '@service-match/shared';

import type { RawServiceRow } from './csv-parser.js';
import { DatasetColumn } from './dataset-validator.js';

export const UNNAMED_SERVICE = 'Unnamed Service';

export const DEFAULT_DESCRIPTION = 'No description available for this service.';

export const MIN_DESCRIPTION_LENGTH = 10;

const VALID_PRICES: readonly string[] = [...PRICE_CATEGORIES, UNKNOWN_CATEGORY];

const VALID_LANGUAGES: readonly string[] = [...LANGUAGE_OPTIONS, UNKNOWN_CATEGORY];

const CATEGORY_COLUMNS: ReadonlyArray<[CategoricalField, DatasetColumn]> = [
  ['businessType', DatasetColumn.BUSINESS_TYPE],
  ['priceCategory', DatasetColumn.PRICE_CATEGORY],
  ['languageSupport', DatasetColumn.LANGUAGE_SUPPORT],
  ['locationArea', DatasetColumn.LOCATION_AREA],
];

export type { CleaningReport };

export interface CleaningResult {
  services: ServiceRecord[];
  report: CleaningReport;
}

interface IndexedRow {
  position: number;
  row: RawServiceRow;
}

/**
 * A cell value, or undefined when the cell is absent or blank
 */
function presentValue(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Trims, collapses whitespace and strips everything except letters, digits,
 * underscores, whitespace and . , ! ? -
 */
export function cleanText(value: string): string {
  return value
    .replace(/[^\p{L}\p{N}_\s.,!?-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Most frequent present value of a column; ties go to the lexically first
 */
export function columnMode(rows: readonly RawServiceRow[], column: string): string | undefined {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const value = presentValue(row[column]);
    if (value !== undefined) {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== undefined && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

function removeDuplicates(rows: IndexedRow[]): IndexedRow[] {
  const seenRows = new Set<string>();
  const seenIds = new Set<string>();

  return rows.filter(({ row }) => {
    const rowKey = JSON.stringify(Object.values(DatasetColumn).map((column) => row[column] ?? null));
    if (seenRows.has(rowKey)) {
      return false;
    }
    seenRows.add(rowKey);

    const id = presentValue(row[DatasetColumn.SERVICE_ID]);
    if (id === undefined) {
      return true;
    }
    const key = id.trim();
    if (seenIds.has(key)) {
      return false;
    }
    seenIds.add(key);
    return true;
  });
}

function generateServiceId(position: number, taken: Set<string>): string {
  const base = `SRV_${String(position).padStart(4, '0')}`;
  let candidate = base;
  let suffix = 1;
  while (taken.has(candidate)) {
    candidate = `${base}_${suffix}`;
    suffix++;
  }
  taken.add(candidate);
  return candidate;
}

/**
 * Runs the full cleaning pipeline over raw dataset rows
 *
 * @throws CatalogValidationError when the cleaned catalog still repeats a service id
 */
export function cleanCatalog(
  rows: readonly RawServiceRow[],
  logger: Logger = getLogger()
): CleaningResult {
  const indexed = rows.map((row, position) => ({ position, row }));
  const deduplicated = removeDuplicates(indexed);
  const duplicatesRemoved = indexed.length - deduplicated.length;

  const remaining = deduplicated.map(({ row }) => row);
  const modes = new Map<DatasetColumn, string>(
    CATEGORY_COLUMNS.map(([, column]) => [column, columnMode(remaining, column) ?? UNKNOWN_CATEGORY])
  );
  const takenIds = new Set(
    remaining.map((row) => row[DatasetColumn.SERVICE_ID]?.trim() ?? '').filter((id) => id !== '')
  );

  let missingValuesHandled = 0;
  const fill = (value: string | undefined, fallback: () => string): string => {
    const present = presentValue(value);
    if (present === undefined) {
      missingValuesHandled++;
      return fallback();
    }
    return present;
  };

  const candidates: ServiceRecord[] = deduplicated.map(({ position, row }) => {
    const id = fill(row[DatasetColumn.SERVICE_ID], () => generateServiceId(position, takenIds)).trim();
    const rawName = fill(row[DatasetColumn.SERVICE_NAME], () => UNNAMED_SERVICE);
    const rawDescription = fill(row[DatasetColumn.DESCRIPTION], () => DEFAULT_DESCRIPTION);

    const categories: Record<CategoricalField, string> = {
      businessType: '',
      priceCategory: '',
      languageSupport: '',
      locationArea: '',
    };
    for (const [field, column] of CATEGORY_COLUMNS) {
      const raw = fill(row[column], () => modes.get(column) ?? UNKNOWN_CATEGORY);
      categories[field] = standardizeCategory(field, raw);
    }

    const name = toTitleCase(cleanText(rawName));

    return {
      id,
      name: name === '' ? UNNAMED_SERVICE : name,
      ...categories,
      description: cleanText(rawDescription),
    };
  });

  const services = candidates.filter(
    (service) =>
      VALID_PRICES.includes(service.priceCategory) &&
      VALID_LANGUAGES.includes(service.languageSupport) &&
      service.description.length >= MIN_DESCRIPTION_LENGTH &&
      ServiceRecordSchema.safeParse(service).success
  );
  const invalidRecordsRemoved = candidates.length - services.length;

  const validation = safeValidateServiceCatalog(services);
  if (!validation.success) {
    throw new CatalogValidationError(
      'Cleaned catalog failed validation',
      formatValidationErrors(validation.error)
    );
  }

  const report: CleaningReport = {
    originalRecords: rows.length,
    finalRecords: validation.data.length,
    recordsRemoved: rows.length - validation.data.length,
    duplicatesRemoved,
    missingValuesHandled,
    invalidRecordsRemoved,
  };

  logger.info('Catalog cleaning complete', { ...report });

  return { services: validation.data, report };
}
