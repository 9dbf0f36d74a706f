import { applyReconciliation, existingFolderNames, fetchSource, planReconciliation } from '../entity-registry.js';
import { hasIdentity, saveEntityTable, type Entity } from '../entity-table.js';
import type { RunContext, StageReport } from '../run-context.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P1: entity folders';

/**
 * P1: bring every entity's folder to its desired name, then fetch each
 * entity's source original from the store.
 */
async function run(context: RunContext, state: PipelineState): Promise<StageReport> {
  const scope = context.stage('reconcile', TITLE);
  const root = context.paths.destinationRoot;

  const steps = planReconciliation(state.table.entities, existingFolderNames(root));
  scope.addUnits(steps.length);

  const { entities, report } = applyReconciliation(state.table.entities, steps, {
    root,
    copy: context.copyOptions(),
    logger: scope.logger,
    onError: (entity, error) => scope.fail(`row ${entity.row} (${entity.folderName})`, error),
    onResidual: (folder, remaining) =>
      scope.flagIssue(folder, `history folder not removed, ${remaining.length} entries left: ${remaining.join(', ')}`),
  });

  const moved = report.renamed + report.merged;
  scope.changed(moved);
  scope.skipped(steps.length - moved - report.failed);
  scope.logger.info('Folders reconciled', {
    renamed: report.renamed,
    merged: report.merged,
    created: report.created,
    relinked: report.relinked,
  });

  const fetched: Entity[] = [];
  for (const entity of entities) {
    if (!hasIdentity(entity) || entity.sourceCode === '') {
      fetched.push(entity);
      continue;
    }

    const folderPath = context.folderPath(entity.folderName);
    const result = await scope.unit(
      `row ${entity.row} ${entity.sourceCode}`,
      () => fetchSource(state.store, entity, folderPath, context.copyOptions()),
      folderPath
    );

    if (result?.status === 'copied') {
      scope.changed();
      scope.logger.info(`Fetched ${entity.sourceCode} into ${entity.folderName}`);
    } else if (result) {
      scope.skipped();
    }
    fetched.push({ ...entity, status: result ? 'ok' : 'missing' });
  }

  state.table = { ...state.table, entities: fetched };
  await scope.unit('entity table', () => saveEntityTable(state.table), state.table.path);

  return scope.finish();
}

export const reconcileStage: Stage = { number: 1, name: 'reconcile', title: TITLE, run };
