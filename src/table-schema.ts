/**
 * Typed column schemas for the spreadsheets.
 *
 * A schema is bound once per loaded sheet. Missing required columns become
 * `MissingColumn` issues; columns the schema does not know are carried as
 * extras so a full rewrite keeps them.
 */

import type { SchemaIssue } from './errors.js';
import type { SheetData } from './spreadsheet.js';

export interface ColumnSpec<K extends string> {
  key: K;
  header: string;
  required: boolean;
}

export interface TableSchema<K extends string> {
  table: string;
  columns: ReadonlyArray<ColumnSpec<K>>;
}

function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, ' ');
}

export class TableRecord<K extends string> {
  constructor(
    readonly row: number,
    private values: readonly string[],
    private indexes: ReadonlyMap<K, number>,
    readonly extra: Readonly<Record<string, string>>
  ) {}

  get(key: K): string {
    const index = this.indexes.get(key);
    return index === undefined ? '' : (this.values[index] ?? '').trim();
  }
}

export interface BoundTable<K extends string> {
  records: TableRecord<K>[];
  issues: SchemaIssue[];
  present: ReadonlySet<K>;
  extraHeaders: string[];
}

export function bindTable<K extends string>(schema: TableSchema<K>, sheet: SheetData): BoundTable<K> {
  const byHeader = new Map<string, number>();
  sheet.headers.forEach((header, index) => {
    const normalized = normalizeHeader(header);
    if (normalized && !byHeader.has(normalized)) byHeader.set(normalized, index);
  });

  const indexes = new Map<K, number>();
  const issues: SchemaIssue[] = [];
  const known = new Set<number>();

  for (const column of schema.columns) {
    const index = byHeader.get(normalizeHeader(column.header));
    if (index === undefined) {
      if (column.required) {
        issues.push({ kind: 'MissingColumn', table: schema.table, column: column.header });
      }
      continue;
    }
    indexes.set(column.key, index);
    known.add(index);
  }

  const extraColumns = sheet.headers
    .map((header, index) => ({ header, index }))
    .filter(({ header, index }) => header !== '' && !known.has(index));

  const records = sheet.rows.map(row => {
    const extra: Record<string, string> = {};
    for (const { header, index } of extraColumns) {
      extra[header] = row.values[index] ?? '';
    }
    return new TableRecord(row.number, row.values, indexes, extra);
  });

  return {
    records,
    issues,
    present: new Set(indexes.keys()),
    extraHeaders: extraColumns.map(({ header }) => header),
  };
}

/**
 * Header row for a rewrite: schema columns first, then carried extras
 */
export function headersFor<K extends string>(schema: TableSchema<K>, extraHeaders: readonly string[]): string[] {
  return [...schema.columns.map(column => column.header), ...extraHeaders];
}
