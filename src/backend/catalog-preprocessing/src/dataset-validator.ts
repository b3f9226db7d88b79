/**
 * Dataset Validator
 *
 * Structural checks on a raw dataset before it is cleaned.
 */

import type { RawServiceRow } from './csv-parser.js';

/**
 * Column names of the raw service dataset
 */
export const DatasetColumn = {
  SERVICE_ID: 'Service_ID',
  SERVICE_NAME: 'Service_Name',
  BUSINESS_TYPE: 'Target_Business_Type',
  PRICE_CATEGORY: 'Price_Category',
  LANGUAGE_SUPPORT: 'Language_Support',
  LOCATION_AREA: 'Location_Area',
  DESCRIPTION: 'Description',
} as const;

export type DatasetColumn = (typeof DatasetColumn)[keyof typeof DatasetColumn];

export const REQUIRED_COLUMNS: readonly DatasetColumn[] = Object.values(DatasetColumn);

export interface DatasetValidationResult {
  valid: boolean;
  errors: string[];
}

export function validateDataset(
  rows: readonly RawServiceRow[],
  columns: readonly string[]
): DatasetValidationResult {
  const errors: string[] = [];

  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    errors.push(`Missing required columns: ${missing.join(', ')}`);
  }

  if (rows.length === 0) {
    errors.push('Dataset is empty');
  }

  return { valid: errors.length === 0, errors };
}
