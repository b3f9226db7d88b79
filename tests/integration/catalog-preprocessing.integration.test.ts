/**
 * Integration Tests for Catalog Preprocessing
 *
 * CSV parsing, dataset validation, the cleaning pipeline and file loading
 * from the fixtures directory and the bundled sample catalog.
 */

import path from 'path';
import { describe, expect, it } from 'vitest';

import {
  CatalogValidationError,
  LogLevel,
  createLogger,
} from '../../src/backend/shared/src/index.js';
import {
  DEFAULT_DESCRIPTION,
  cleanCatalog,
  cleanText,
  columnMode,
  loadCatalogFile,
  parseCsv,
  parseCsvRecords,
  parseJsonDataset,
  validateDataset,
} from '../../src/backend/catalog-preprocessing/src/index.js';

const fixture = (name: string) => path.join(process.cwd(), 'tests/fixtures', name);

const logger = createLogger({ enableConsole: false });

const HEADER =
  'Service_ID,Service_Name,Target_Business_Type,Price_Category,Language_Support,Location_Area,Description';

const MESSY_CSV = [
  HEADER,
  'SRV_0001,  shelf display design ,retail,low,hindi,mumbai,"Shelf layouts, window displays!"',
  'SRV_0001,  shelf display design ,retail,low,hindi,mumbai,"Shelf layouts, window displays!"',
  'SRV_0001,Other Name,Retail,Low,Hindi,Mumbai,Duplicate id with different content.',
  ',Menu @Engineering#,Restaurant,,English,Delhi,Menu pricing analysis for restaurants.',
  'SRV_0005,Kitchen Audit,Restaurant,Premium,Hindi,Delhi,Monthly hygiene inspections.',
  'SRV_0006,Short Desc,Retail,Medium,English,Pune,Too short',
  'SRV_0007,,Technology,High,bilingual,online,',
].join('\n');

describe('Catalog Preprocessing Integration', () => {
  describe('CSV parsing', () => {
    it('handles quoted fields, doubled quotes, CRLF and blank lines', () => {
      expect(parseCsvRecords('a,b\r\n"x, y","he said ""hi"""\r\n\r\n')).toEqual([
        ['a', 'b'],
        ['x, y', 'he said "hi"'],
      ]);
    });

    it('keeps newlines inside quoted fields', () => {
      expect(parseCsvRecords('a\n"line1\nline2"')).toEqual([['a'], ['line1\nline2']]);
    });

    it('strips a byte order mark from the header', () => {
      expect(parseCsv('\uFEFFService_ID\nX').columns).toEqual(['Service_ID']);
    });

    it('leaves missing trailing cells undefined', () => {
      expect(parseCsv('a,b,c\n1,2').rows).toEqual([{ a: '1', b: '2', c: undefined }]);
    });

    it('rejects an unterminated quoted field', () => {
      expect(() => parseCsvRecords('a\n"oops')).toThrow(CatalogValidationError);
    });

    it('returns no columns for empty input', () => {
      expect(parseCsv('')).toEqual({ columns: [], rows: [] });
    });
  });

  describe('Dataset validation', () => {
    it('reports missing columns and an empty dataset', () => {
      expect(validateDataset([], ['Service_ID'])).toEqual({
        valid: false,
        errors: [
          'Missing required columns: Service_Name, Target_Business_Type, Price_Category, Language_Support, Location_Area, Description',
          'Dataset is empty',
        ],
      });
    });

    it('accepts a dataset with every column', () => {
      const { columns, rows } = parseCsv(MESSY_CSV);
      expect(validateDataset(rows, columns)).toEqual({ valid: true, errors: [] });
    });
  });

  describe('Cleaning helpers', () => {
    it('strips symbols and collapses whitespace', () => {
      expect(cleanText('  Fresh   juice & snacks #1 ')).toBe('Fresh juice snacks 1');
    });

    it('finds the most frequent present value', () => {
      expect(columnMode([{ c: 'x' }, { c: 'y' }, { c: 'y' }, { c: ' ' }], 'c')).toBe('y');
      expect(columnMode([{ c: 'b' }, { c: 'a' }], 'c')).toBe('a');
      expect(columnMode([{ c: '' }, {}], 'c')).toBeUndefined();
    });
  });

  describe('cleanCatalog', () => {
    const { rows } = parseCsv(MESSY_CSV);
    const { services, report } = cleanCatalog(rows, logger);

    it('reports what each step removed or filled', () => {
      expect(report).toEqual({
        originalRecords: 7,
        finalRecords: 3,
        recordsRemoved: 4,
        duplicatesRemoved: 2,
        missingValuesHandled: 4,
        invalidRecordsRemoved: 2,
      });
    });

    it('standardizes text and categories', () => {
      expect(services[0]).toEqual({
        id: 'SRV_0001',
        name: 'Shelf Display Design',
        businessType: 'Retail',
        priceCategory: 'Low',
        languageSupport: 'Hindi',
        locationArea: 'Mumbai',
        description: 'Shelf layouts, window displays!',
      });
    });

    it('generates ids and imputes missing categories with the column mode', () => {
      expect(services[1]).toEqual({
        id: 'SRV_0003',
        name: 'Menu Engineering',
        businessType: 'Restaurant',
        priceCategory: 'High',
        languageSupport: 'English',
        locationArea: 'Delhi',
        description: 'Menu pricing analysis for restaurants.',
      });
    });

    it('fills missing names and descriptions and maps synonyms', () => {
      expect(services[2]).toEqual({
        id: 'SRV_0007',
        name: 'Unnamed Service',
        businessType: 'Technology',
        priceCategory: 'High',
        languageSupport: 'Both',
        locationArea: 'Remote',
        description: DEFAULT_DESCRIPTION,
      });
    });

    it('falls back to Unknown when a column has no values at all', () => {
      const result = cleanCatalog(
        [
          {
            Service_ID: 'S1',
            Service_Name: 'Anywhere Service',
            Target_Business_Type: 'Retail',
            Price_Category: 'Low',
            Language_Support: 'Hindi',
            Location_Area: '',
            Description: 'A service with no location.',
          },
        ],
        logger
      );

      expect(result.services[0]?.locationArea).toBe('Unknown');
    });

    it('drops a record whose description exceeds the length limit and keeps the rest', () => {
      const row = (id: string, description: string) => ({
        Service_ID: id,
        Service_Name: 'Window Cleaning',
        Target_Business_Type: 'Retail',
        Price_Category: 'Low',
        Language_Support: 'Hindi',
        Location_Area: 'Mumbai',
        Description: description,
      });

      const result = cleanCatalog([row('S1', 'x'.repeat(2001)), row('S2', 'Weekly storefront glass cleaning.')], logger);

      expect(result.services.map((s) => s.id)).toEqual(['S2']);
      expect(result.report).toEqual({
        originalRecords: 2,
        finalRecords: 1,
        recordsRemoved: 1,
        duplicatesRemoved: 0,
        missingValuesHandled: 0,
        invalidRecordsRemoved: 1,
      });
    });

    it('numbers a generated id from the 0-based row position', () => {
      const row = (id: string, description: string) => ({
        Service_ID: id,
        Service_Name: 'Floor Care',
        Target_Business_Type: 'Retail',
        Price_Category: 'Low',
        Language_Support: 'English',
        Location_Area: 'Pune',
        Description: description,
      });

      const result = cleanCatalog(
        [row('', 'Weekly storefront glass cleaning.'), row('S2', 'Monthly deep cleaning of shop floors.')],
        logger
      );

      expect(result.services.map((s) => s.id)).toEqual(['SRV_0000', 'S2']);
    });

    it('logs a cleaning summary', () => {
      const recording = createLogger({ enableConsole: false, minLevel: LogLevel.INFO });
      cleanCatalog(rows, recording);

      const entry = recording.getLogEntries().find((e) => e.message === 'Catalog cleaning complete');
      expect(entry?.metadata).toMatchObject({ finalRecords: 3, duplicatesRemoved: 2 });
    });
  });

  describe('loadCatalogFile', () => {
    it('loads and cleans the bundled sample catalog', async () => {
      const { services, report, source } = await loadCatalogFile(
        path.join(process.cwd(), 'data/services.csv'),
        logger
      );

      expect(source).toContain('services.csv');
      expect(services).toHaveLength(24);
      expect(report.recordsRemoved).toBe(0);
      expect(report.missingValuesHandled).toBe(0);
      expect(services[0]).toEqual({
        id: 'SRV_0001',
        name: 'Shelf Display Design',
        businessType: 'Retail',
        priceCategory: 'Low',
        languageSupport: 'Hindi',
        locationArea: 'Mumbai',
        description: 'In-store shelf layouts and window displays for small shops, planned around footfall.',
      });
    });

    it('loads a JSON dataset', async () => {
      const { services, report } = await loadCatalogFile(fixture('services.json'), logger);

      expect(services.map((s) => s.id)).toEqual(['101', 'SRV_0001']);
      expect(services[1]?.locationArea).toBe('Remote');
      expect(report.missingValuesHandled).toBe(1);
    });

    it('rejects a dataset with missing columns', async () => {
      await expect(loadCatalogFile(fixture('missing-columns.csv'), logger)).rejects.toThrow(
        'Catalog dataset is invalid'
      );
    });

    it('rejects an unsupported file type', async () => {
      await expect(loadCatalogFile('catalog.txt', logger)).rejects.toThrow('Unsupported catalog file type: .txt');
    });

    it('rejects JSON that is not an array of rows', () => {
      expect(() => parseJsonDataset('{"Service_ID": "X"}')).toThrow('Catalog JSON must be an array of row objects');
    });
  });
});
