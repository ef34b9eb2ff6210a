/**
 * Fixed-width text table for result rows.
 */

import type { Row } from '../db/types.js';

export const NO_RESULTS = 'No results returned.';

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'bigint') return val.toString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

/**
 * Column width is the longest of the header and every cell in the column.
 * Cells are left aligned; columns are joined with ' | ' and the header
 * separator with '-+-'.
 */
export function formatTable(columns: string[], rows: Row[]): string {
  if (rows.length === 0 || columns.length === 0) return NO_RESULTS;

  const cells = rows.map((row) => columns.map((col) => formatValue(row[col])));
  const widths = columns.map((col, i) => Math.max(col.length, ...cells.map((line) => line[i].length)));

  const lines = [
    columns.map((col, i) => col.padEnd(widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
    ...cells.map((line) => line.map((cell, i) => cell.padEnd(widths[i])).join(' | ')),
  ];
  return lines.join('\n');
}

/** Table with columns taken from the first row, in its key order. */
export function formatRows(rows: Row[]): string {
  if (rows.length === 0) return NO_RESULTS;
  return formatTable(Object.keys(rows[0]), rows);
}
