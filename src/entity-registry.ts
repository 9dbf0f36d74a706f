/**
 * Folder identity reconciliation.
 *
 * `planReconciliation` is pure: given the entities and the folder names that
 * exist under the destination root, it decides what each row needs.
 * `applyReconciliation` performs the moves and returns the updated entities.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmdirSync, rmSync } from 'fs';
import { join } from 'path';
import { hasIdentity, normalizeEntity, type Entity } from './entity-table.js';
import { LookupError, toUnitError } from './errors.js';
import type { Logger } from './logger.js';
import { safeCopy, type SafeCopyOptions, type SafeCopyResult } from './safe-copy.js';
import type { SourceStore } from './source-store.js';
import { snapshotFolder } from './folder-snapshot.js';

export type ReconcileStep =
  /** history equals desired */
  | { kind: 'keep'; index: number; desired: string }
  /** move the history folder to the free desired name */
  | { kind: 'rename'; index: number; history: string; desired: string }
  /** copy the history folder into the existing desired folder */
  | { kind: 'merge'; index: number; history: string; desired: string }
  /** nothing to move: history folder absent or already handled in this pass */
  | { kind: 'relink'; index: number; history: string; desired: string };

export interface ReconcileReport {
  renamed: number;
  merged: number;
  created: number;
  relinked: number;
  failed: number;
  residualFolders: string[];
}

export interface ReconcileResult {
  entities: Entity[];
  report: ReconcileReport;
}

export interface ReconcileOptions {
  root: string;
  copy: SafeCopyOptions;
  logger: Logger;
  /** Called for every failed row; the row keeps its stored history */
  onError?: (entity: Entity, error: Error) => void;
  /** Called when a merged history folder cannot be removed */
  onResidual?: (folder: string, remaining: string[]) => void;
}

/**
 * Decide the step for every row with an identity, in table order.
 * Folder existence is simulated so later rows see the effect of earlier ones.
 */
export function planReconciliation(
  entities: readonly Entity[],
  existingFolders: ReadonlySet<string>
): ReconcileStep[] {
  const folders = new Set(existingFolders);
  const handled = new Set<string>();
  const steps: ReconcileStep[] = [];

  entities.forEach((raw, index) => {
    if (!hasIdentity(raw)) return;
    const entity = normalizeEntity(raw);
    const desired = entity.folderName;
    const history = entity.historyName;

    if (history === desired) {
      steps.push({ kind: 'keep', index, desired });
      folders.add(desired);
      return;
    }

    const pair = `${history}\u0000${desired}`;
    if (handled.has(pair) || !folders.has(history)) {
      steps.push({ kind: 'relink', index, history, desired });
      folders.add(desired);
      return;
    }

    steps.push({ kind: folders.has(desired) ? 'merge' : 'rename', index, history, desired });
    handled.add(pair);
    folders.delete(history);
    folders.add(desired);
  });

  return steps;
}

function sameBytes(a: string, b: string): boolean {
  return readFileSync(a).equals(readFileSync(b));
}

/**
 * Move every file of `from` into `to` with safe copy. A source file is
 * removed only once `to` holds its exact bytes; a same-size match with
 * other content stays behind. Returns the entries left behind.
 */
function mergeFolder(from: string, to: string, copy: SafeCopyOptions, logger: Logger): string[] {
  const snapshot = snapshotFolder(from);
  const remaining: string[] = [...snapshot.directories];

  for (const file of snapshot.files) {
    try {
      const result = safeCopy(file.path, join(to, file.name), copy);
      if (result.status === 'identical' && copy.identity !== 'content' && !sameBytes(file.path, result.path)) {
        logger.warn(`Kept ${file.path}: ${result.path} has the same size but other content`);
        remaining.push(file.name);
        continue;
      }
      rmSync(file.path);
      logger.debug(`Merged ${file.name}`, { into: result.path, status: result.status });
    } catch (error) {
      logger.warn(`Could not merge ${file.path}: ${toUnitError(error, file.path).message}`);
      remaining.push(file.name);
    }
  }

  if (remaining.length === 0) {
    rmdirSync(from);
  }
  return remaining;
}

export function applyReconciliation(
  entities: readonly Entity[],
  steps: readonly ReconcileStep[],
  options: ReconcileOptions
): ReconcileResult {
  const { root, logger } = options;
  const updated = entities.map(entity => (hasIdentity(entity) ? { ...entity, folderName: normalizeEntity(entity).folderName } : entity));
  const report: ReconcileReport = { renamed: 0, merged: 0, created: 0, relinked: 0, failed: 0, residualFolders: [] };

  const ensureFolder = (name: string): void => {
    const path = join(root, name);
    if (!existsSync(path)) {
      mkdirSync(path, { recursive: true });
      report.created++;
      logger.info(`Created folder ${name}`);
    }
  };

  const relinkAll = (history: string, desired: string): void => {
    updated.forEach((entity, index) => {
      if (entity.historyName === history) {
        updated[index] = { ...entity, historyName: desired };
      }
    });
  };

  for (const step of steps) {
    const entity = updated[step.index];
    try {
      switch (step.kind) {
        case 'keep':
          ensureFolder(step.desired);
          break;

        case 'rename':
          renameSync(join(root, step.history), join(root, step.desired));
          report.renamed++;
          logger.info(`Renamed folder ${step.history} -> ${step.desired}`);
          relinkAll(step.history, step.desired);
          break;

        case 'merge': {
          const remaining = mergeFolder(join(root, step.history), join(root, step.desired), options.copy, logger);
          report.merged++;
          if (remaining.length > 0) {
            report.residualFolders.push(step.history);
            logger.warn(`Folder ${step.history} merged into ${step.desired} with ${remaining.length} entries left`);
            options.onResidual?.(step.history, remaining);
          } else {
            logger.info(`Merged folder ${step.history} into ${step.desired}`);
          }
          relinkAll(step.history, step.desired);
          break;
        }

        case 'relink':
          ensureFolder(step.desired);
          report.relinked++;
          break;
      }

      ensureFolder(updated[step.index].folderName);
      updated[step.index] = { ...updated[step.index], historyName: updated[step.index].folderName };
    } catch (error) {
      report.failed++;
      options.onError?.(entity, toUnitError(error, join(root, entity.folderName)));
    }
  }

  return { entities: updated, report };
}

/**
 * Names of folders under the root, for planning
 */
export function existingFolderNames(root: string): Set<string> {
  if (!existsSync(root)) return new Set();
  return new Set(
    readdirSync(root, { withFileTypes: true })
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
  );
}

/**
 * Copy the entity's source original from the store into its folder under
 * the source's own name. Throws LookupError when the store has no match.
 */
export function fetchSource(
  store: SourceStore,
  entity: Entity,
  folderPath: string,
  copy: SafeCopyOptions
): SafeCopyResult {
  mkdirSync(folderPath, { recursive: true });
  const source = store.find(entity.sourceCode);
  if (!source) {
    throw new LookupError(`No source document for ${entity.sourceCode}`, 'SOURCE_NOT_FOUND', {
      code: entity.sourceCode,
      row: entity.row,
    });
  }
  return safeCopy(source.path, join(folderPath, source.name), copy);
}
