/**
 * Catalog Preprocessing
 *
 * Loading, validation and cleaning of the raw service dataset.
 */

export * from './csv-parser.js';
export * from './dataset-validator.js';
export * from './catalog-cleaner.js';
export * from './catalog-loader.js';
