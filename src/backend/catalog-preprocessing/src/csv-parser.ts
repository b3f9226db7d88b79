/**
 * CSV Parser
 *
 * Reads RFC 4180 text: quoted fields, doubled quotes inside quotes, embedded
 * newlines and CRLF line endings. The first record is the header.
 *
 * @tested tests/integration/catalog-preprocessing.integration.test.ts
 */

import { CatalogValidationError } from '@service-match/shared';

/**
 * One dataset row keyed by header column; absent cells are undefined
 */
export type RawServiceRow = Readonly<Record<string, string | undefined>>;

export interface ParsedCsv {
  columns: string[];
  rows: RawServiceRow[];
}

/**
 * Splits CSV text into records of raw cell strings
 */
export function parseCsvRecords(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;
  let line = 1;

  const endField = () => {
    record.push(field);
    field = '';
    fieldStarted = false;
  };

  const endRecord = () => {
    endField();
    // blank lines carry no record
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') {
          line++;
        }
        field += char;
      }
      continue;
    }

    if (char === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\r' && input[i + 1] === '\n') {
      // CRLF: the \n closes the record
    } else if (char === '\n' || char === '\r') {
      endRecord();
      line++;
    } else {
      field += char;
      fieldStarted = true;
    }
  }

  if (inQuotes) {
    throw new CatalogValidationError('Unterminated quoted field in CSV input', [
      { field: `line ${line}`, message: 'Quoted field is never closed', code: 'invalid_csv' },
    ]);
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parses CSV text into header columns and keyed rows
 */
export function parseCsv(text: string): ParsedCsv {
  const [header, ...body] = parseCsvRecords(text);
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map((column) => column.trim());
  const rows = body.map((cells) => {
    const row: Record<string, string | undefined> = {};
    columns.forEach((column, index) => {
      row[column] = cells[index];
    });
    return row;
  });

  return { columns, rows };
}
