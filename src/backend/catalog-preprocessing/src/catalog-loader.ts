/**
 * Catalog Loader
 *
 * Reads a raw service dataset from disk (.csv or .json), validates its
 * structure and runs it through the cleaning pipeline.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import {
  CatalogValidationError,
  formatValidationErrors,
  getLogger,
  type Logger,
} from '@service-match/shared';

import { cleanCatalog, type CleaningResult } from './catalog-cleaner.js';
import { parseCsv, type ParsedCsv, type RawServiceRow } from './csv-parser.js';
import { validateDataset } from './dataset-validator.js';

/**
 * JSON datasets are arrays of row objects; scalar cells are read as text
 */
const JsonDatasetSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
);

export interface CatalogLoadResult extends CleaningResult {
  source: string;
}

/**
 * Parses a JSON dataset into header columns and keyed rows
 */
export function parseJsonDataset(text: string): ParsedCsv {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogValidationError('Catalog file is not valid JSON', [
      {
        field: 'file',
        message: error instanceof Error ? error.message : String(error),
        code: 'invalid_json',
      },
    ]);
  }

  const parsed = JsonDatasetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogValidationError(
      'Catalog JSON must be an array of row objects',
      formatValidationErrors(parsed.error)
    );
  }

  const columns: string[] = [];
  const rows: RawServiceRow[] = parsed.data.map((entry) => {
    const row: Record<string, string | undefined> = {};
    for (const [column, value] of Object.entries(entry)) {
      if (!columns.includes(column)) {
        columns.push(column);
      }
      row[column] = value === null ? undefined : String(value);
    }
    return row;
  });

  return { columns, rows };
}

/**
 * Loads, validates and cleans a catalog file
 *
 * @throws CatalogValidationError for unsupported extensions, malformed content,
 *         missing columns or an empty dataset
 */
export async function loadCatalogFile(
  filePath: string,
  logger: Logger = getLogger()
): Promise<CatalogLoadResult> {
  const extension = path.extname(filePath).toLowerCase();
  if (extension !== '.csv' && extension !== '.json') {
    throw new CatalogValidationError(`Unsupported catalog file type: ${extension || '(none)'}`, [
      { field: 'file', message: 'Expected a .csv or .json file', code: 'unsupported_format' },
    ]);
  }

  logger.info('Loading catalog', { source: filePath });

  const text = await readFile(filePath, 'utf8');
  const dataset = extension === '.csv' ? parseCsv(text) : parseJsonDataset(text);

  const validation = validateDataset(dataset.rows, dataset.columns);
  if (!validation.valid) {
    throw new CatalogValidationError(
      'Catalog dataset is invalid',
      validation.errors.map((message) => ({ field: 'dataset', message, code: 'invalid_dataset' }))
    );
  }

  const result = cleanCatalog(dataset.rows, logger);
  return { ...result, source: filePath };
}
