/**
 * The primary entity table: one row per (loop, system) record
 */

import { existsSync } from 'fs';
import { describeIssue, SetupError, type SchemaIssue } from './errors.js';
import { errorMessage } from './logger.js';
import { makeFolderName } from './naming.js';
import { readSheet, writeSheet } from './spreadsheet.js';
import { bindTable, headersFor, type TableSchema } from './table-schema.js';

export type EntityStatus = 'unknown' | 'ok' | 'missing';

export interface Entity {
  /** Worksheet row the entity was read from */
  row: number;
  sourceCode: string;
  loop: string;
  system: string;
  folderName: string;
  historyName: string;
  status: EntityStatus;
  extra: Readonly<Record<string, string>>;
}

export interface EntityTable {
  path: string;
  entities: readonly Entity[];
  extraHeaders: readonly string[];
}

type EntityColumn = 'sourceCode' | 'loop' | 'system' | 'folderName' | 'historyName' | 'status';

export const ENTITY_SCHEMA: TableSchema<EntityColumn> = {
  table: 'entity table',
  columns: [
    { key: 'sourceCode', header: 'Iso no', required: true },
    { key: 'loop', header: 'loop no', required: true },
    { key: 'system', header: 'system no', required: true },
    { key: 'folderName', header: 'folder name', required: false },
    { key: 'historyName', header: 'history folder name', required: false },
    { key: 'status', header: 'ISO Status', required: false },
  ],
};

const STATUS_TEXT: Record<EntityStatus, string> = {
  unknown: '',
  ok: 'OK',
  missing: 'MISSING',
};

export function statusText(status: EntityStatus): string {
  return STATUS_TEXT[status];
}

/**
 * Status cell text to status. Anything other than OK, MISSING or empty is
 * reported as a BadValue and read as unknown.
 */
export function parseStatus(value: string, at: { table: string; row: number }, issues: SchemaIssue[]): EntityStatus {
  switch (value.trim().toUpperCase()) {
    case '':
      return 'unknown';
    case 'OK':
      return 'ok';
    case 'MISSING':
      return 'missing';
    default:
      issues.push({
        kind: 'BadValue',
        table: at.table,
        column: 'ISO Status',
        row: at.row,
        value,
        reason: 'expected OK, MISSING or empty',
      });
      return 'unknown';
  }
}

/**
 * True when the row carries both identity keys
 */
export function hasIdentity(entity: Entity): boolean {
  return entity.loop !== '' && entity.system !== '';
}

/**
 * Recompute the desired folder name and seed an empty history with it
 */
export function normalizeEntity(entity: Entity): Entity {
  if (!hasIdentity(entity)) return entity;
  const folderName = makeFolderName(entity.loop, entity.system);
  return {
    ...entity,
    folderName,
    historyName: entity.historyName || folderName,
  };
}

export async function loadEntityTable(path: string): Promise<{ table: EntityTable; issues: SchemaIssue[] }> {
  const sheet = await readSheet(path);
  const bound = bindTable(ENTITY_SCHEMA, sheet);
  const issues = [...bound.issues];

  const entities = bound.records.map(
    (record): Entity => ({
      row: record.row,
      sourceCode: record.get('sourceCode'),
      loop: record.get('loop'),
      system: record.get('system'),
      folderName: record.get('folderName'),
      historyName: record.get('historyName'),
      status: parseStatus(record.get('status'), { table: ENTITY_SCHEMA.table, row: record.row }, issues),
      extra: record.extra,
    })
  );

  return { table: { path, entities, extraHeaders: bound.extraHeaders }, issues };
}

export async function saveEntityTable(table: EntityTable): Promise<void> {
  await writeSheet(
    table.path,
    {
      headers: headersFor(ENTITY_SCHEMA, table.extraHeaders),
      rows: table.entities.map(entity => ({
        number: entity.row,
        values: [
          entity.sourceCode,
          entity.loop,
          entity.system,
          entity.folderName,
          entity.historyName,
          statusText(entity.status),
          ...table.extraHeaders.map(header => entity.extra[header] ?? ''),
        ],
      })),
    },
    { highlight: values => values[5] === STATUS_TEXT.missing }
  );
}

/**
 * Pre-flight: the table must exist. A missing table is created with the
 * expected headers so an operator can fill in the identity columns.
 */
export async function prepareEntityTable(path: string): Promise<{ table: EntityTable; issues: SchemaIssue[] }> {
  if (!existsSync(path)) {
    await writeSheet(path, { headers: headersFor(ENTITY_SCHEMA, []), rows: [] });
    throw new SetupError(`Entity table not found; created a template at ${path}. Fill in the first three columns and rerun.`, {
      path,
    });
  }

  let loaded: { table: EntityTable; issues: SchemaIssue[] };
  try {
    loaded = await loadEntityTable(path);
  } catch (error) {
    throw new SetupError(`Entity table cannot be opened: ${path} (${errorMessage(error)})`, { path });
  }

  const missing = loaded.issues.filter(issue => issue.kind === 'MissingColumn');
  if (missing.length > 0) {
    throw new SetupError(`Entity table is missing columns: ${missing.map(describeIssue).join('; ')}`, { path });
  }

  const table: EntityTable = { ...loaded.table, entities: loaded.table.entities.map(normalizeEntity) };
  await saveEntityTable(table);
  return { table, issues: loaded.issues };
}

export function countStatuses(entities: readonly Entity[]): Record<EntityStatus, number> {
  const counts: Record<EntityStatus, number> = { unknown: 0, ok: 0, missing: 0 };
  for (const entity of entities) {
    if (hasIdentity(entity)) counts[entity.status]++;
  }
  return counts;
}
