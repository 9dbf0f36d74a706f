/**
 * Per-folder candidate table (`output.xlsx`): the content codes of a folder,
 * the master pages that belong to each, and the verification status.
 */

import { existsSync } from 'fs';
import type { SchemaIssue } from './errors.js';
import { parseStatus, statusText, type EntityStatus } from './entity-table.js';
import { readSheet, writeSheet } from './spreadsheet.js';
import { bindTable, headersFor, type TableSchema } from './table-schema.js';

export interface CandidateRow {
  row: number;
  code: string;
  /** Raw `PDF PAGE` cell, kept verbatim so a rewrite does not reformat it */
  pages: string;
  status: EntityStatus;
  extra: Readonly<Record<string, string>>;
}

export interface CandidateTable {
  path: string;
  rows: CandidateRow[];
  extraHeaders: readonly string[];
}

type CandidateColumn = 'code' | 'pages' | 'status';

export const CANDIDATE_SCHEMA: TableSchema<CandidateColumn> = {
  table: 'candidate table',
  columns: [
    { key: 'code', header: 'ISO LIST', required: true },
    { key: 'pages', header: 'PDF PAGE', required: true },
    { key: 'status', header: 'ISO Status', required: false },
  ],
};

export function emptyCandidateTable(path: string): CandidateTable {
  return { path, rows: [], extraHeaders: [] };
}

export async function loadCandidateTable(path: string): Promise<{ table: CandidateTable; issues: SchemaIssue[] }> {
  const bound = bindTable(CANDIDATE_SCHEMA, await readSheet(path));
  const issues = [...bound.issues];

  const rows = bound.records
    .map(
      (record): CandidateRow => ({
        row: record.row,
        code: record.get('code'),
        pages: record.get('pages'),
        status: parseStatus(record.get('status'), { table: CANDIDATE_SCHEMA.table, row: record.row }, issues),
        extra: record.extra,
      })
    )
    .filter(row => row.code !== '' || row.pages !== '');

  return { table: { path, rows, extraHeaders: bound.extraHeaders }, issues };
}

/**
 * Load the table if the folder has one
 */
export async function findCandidateTable(
  path: string
): Promise<{ table: CandidateTable; issues: SchemaIssue[] } | undefined> {
  return existsSync(path) ? loadCandidateTable(path) : undefined;
}

export async function saveCandidateTable(table: CandidateTable): Promise<void> {
  await writeSheet(
    table.path,
    {
      headers: headersFor(CANDIDATE_SCHEMA, table.extraHeaders),
      rows: table.rows.map((row, index) => ({
        number: index + 2,
        values: [row.code, row.pages, statusText(row.status), ...table.extraHeaders.map(header => row.extra[header] ?? '')],
      })),
    },
    { highlight: values => values[2] === statusText('missing') }
  );
}

/**
 * Page numbers of a `PDF PAGE` cell (`"3, 5,7"` → [3, 5, 7]).
 * An empty cell has no pages. Parts that are not positive integers become
 * BadValue issues and are left out.
 */
export function parsePageList(value: string, row: number): { pages: number[]; issues: SchemaIssue[] } {
  const pages: number[] = [];
  const issues: SchemaIssue[] = [];

  for (const part of value.split(',')) {
    const text = part.trim();
    if (text === '') continue;

    // Spreadsheet apps store a lone page number as a float
    const normalized = /^\d+\.0+$/.test(text) ? text.slice(0, text.indexOf('.')) : text;
    if (!/^\d+$/.test(normalized) || Number.parseInt(normalized, 10) === 0) {
      issues.push({
        kind: 'BadValue',
        table: CANDIDATE_SCHEMA.table,
        column: 'PDF PAGE',
        row,
        value: text,
        reason: 'expected a page number',
      });
      continue;
    }
    pages.push(Number.parseInt(normalized, 10));
  }

  return { pages, issues };
}

export function formatPageList(pages: readonly number[]): string {
  return [...new Set(pages)].sort((a, b) => a - b).join(',');
}

export function candidateCodes(table: CandidateTable): Set<string> {
  return new Set(table.rows.map(row => row.code).filter(code => code !== ''));
}
