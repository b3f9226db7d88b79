/**
 * CSV Export
 *
 * Writes recommendation export rows in the interchange column order.
 * Fields containing a comma, quote or line break are quoted, with inner
 * quotes doubled.
 *
 * @tested tests/e2e/complete-workflow.e2e.test.ts
 */

import { EXPORT_COLUMNS, type RecommendationExport } from '@service-match/shared';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

function formatCell(row: RecommendationExport, column: (typeof EXPORT_COLUMNS)[number]): string {
  if (column === 'score') {
    return row.score.toFixed(2);
  }
  return escapeCsvField(row[column]);
}

/**
 * Header line plus one line per row, CRLF separated
 */
export function toCsv(rows: readonly RecommendationExport[]): string {
  const lines = [EXPORT_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(EXPORT_COLUMNS.map((column) => formatCell(row, column)).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
