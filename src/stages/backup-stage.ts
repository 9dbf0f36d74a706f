import { join } from 'path';
import { listEntityFolders, snapshotFolder } from '../folder-snapshot.js';
import { backupNameFor, classifyDocument } from '../naming.js';
import type { RunContext, StageReport } from '../run-context.js';
import { safeCopy } from '../safe-copy.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P4: backup copies';

/**
 * P4: keep a `<name><suffix>.pdf` copy beside every source original and
 * extracted page. An identical copy already in place counts as done.
 */
async function run(context: RunContext, _state: PipelineState): Promise<StageReport> {
  const scope = context.stage('backup', TITLE);
  const { naming } = context.config;

  for (const folder of listEntityFolders(context.paths.destinationRoot)) {
    const folderPath = context.folderPath(folder);
    const snapshot = await scope.unit(folder, () => snapshotFolder(folderPath), folderPath);
    if (!snapshot) continue;

    for (const file of snapshot.files) {
      const role = classifyDocument(file.name, naming);
      if (role !== 'source-original' && role !== 'extracted-range') continue;

      const target = join(folderPath, backupNameFor(file.name, naming));
      const result = await scope.unit(`${folder}/${file.name}`, () => safeCopy(file.path, target, context.copyOptions()), target);
      if (result?.status === 'copied') {
        scope.changed();
        scope.logger.debug(`Backup written: ${result.path}`);
      } else if (result) {
        scope.skipped();
      }
    }
  }

  return scope.finish();
}

export const backupStage: Stage = { number: 4, name: 'backup', title: TITLE, run };
