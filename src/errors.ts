/**
 * Error taxonomy for a synchronization run.
 *
 * Only SetupError ends a run. The others are caught at the unit that raised
 * them (a row, a file, a folder) and written to the error report.
 */

import { AppError, errorMessage } from './logger.js';

export type SchemaIssue =
  | { kind: 'MissingColumn'; table: string; column: string }
  | { kind: 'BadValue'; table: string; column: string; row: number; value: string; reason: string };

export function describeIssue(issue: SchemaIssue): string {
  if (issue.kind === 'MissingColumn') {
    return `${issue.table}: missing column "${issue.column}"`;
  }
  return `${issue.table} row ${issue.row}: bad ${issue.column} "${issue.value}" (${issue.reason})`;
}

export class SetupError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SETUP_ERROR', context);
    this.name = 'SetupError';
  }
}

export class LookupError extends AppError {
  constructor(message: string, code: string = 'NOT_FOUND', context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'LookupError';
  }
}

export class FileIOError extends AppError {
  constructor(message: string, public path: string, public original?: unknown) {
    super(message, 'IO_ERROR', { path });
    this.name = 'FileIOError';
  }
}

export class FormatError extends AppError {
  constructor(public issue: SchemaIssue) {
    super(describeIssue(issue), issue.kind === 'MissingColumn' ? 'MISSING_COLUMN' : 'BAD_VALUE');
    this.name = 'FormatError';
  }
}

/**
 * Normalize anything thrown inside a unit into the taxonomy
 */
export function toUnitError(error: unknown, path: string): AppError {
  if (error instanceof AppError) return error;
  return new FileIOError(errorMessage(error), path, error);
}
