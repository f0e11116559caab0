/**
 * Table writers
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { HrTables, Table } from '../tables.js';

export type OutputFormat = 'csv' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json'];

/**
 * Render one cell. Nulls become empty cells; values containing a comma, quote
 * or line break are quoted with inner quotes doubled.
 */
export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Convert a table to CSV: a header row, then one line per row.
 */
export function toCSV<Row>(table: Table<Row>): string {
  const lines = [table.columns.map(formatCell).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => formatCell(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function toJSON<Row>(table: Table<Row>): string {
  return JSON.stringify(table.rows, null, 2) + '\n';
}

export function serializeTable<Row>(table: Table<Row>, format: OutputFormat): string {
  return format === 'csv' ? toCSV(table) : toJSON(table);
}

/**
 * Write one file per table into `outDir`, creating it if needed. Returns the
 * written paths in table order.
 */
export async function writeTables(tables: HrTables, outDir: string, format: OutputFormat = 'csv'): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const files: Array<[string, string]> = [];
  const collect = <Row>(table: Table<Row> | undefined): void => {
    if (table) files.push([join(outDir, `${table.name}.${format}`), serializeTable(table, format)]);
  };

  collect(tables.employee);
  collect(tables.employee_job_assignment);
  collect(tables.employee_org_assignment);
  collect(tables.employee_compensation);
  collect(tables.employee_performance);
  collect(tables.organization_unit);
  collect(tables.job_role);
  collect(tables.location);

  await Promise.all(files.map(([path, content]) => writeFile(path, content, 'utf-8')));
  return files.map(([path]) => path);
}
