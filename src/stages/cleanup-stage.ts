import { rmSync } from 'fs';
import { candidateCodes, findCandidateTable } from '../candidate-table.js';
import { FormatError } from '../errors.js';
import { listEntityFolders, snapshotFolder } from '../folder-snapshot.js';
import { sourceContentCode } from '../naming.js';
import type { RunContext, StageReport } from '../run-context.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P5: redundancy cleanup';

/**
 * P5: delete source originals whose content code is no longer listed in the
 * folder's candidate table. Extracted pages, backups, the merged output and
 * PDFs without a code are never touched.
 */
async function run(context: RunContext, _state: PipelineState): Promise<StageReport> {
  const scope = context.stage('cleanup', TITLE);
  const { naming } = context.config;

  for (const folder of listEntityFolders(context.paths.destinationRoot)) {
    const folderPath = context.folderPath(folder);
    const tablePath = context.candidateTablePath(folder);

    const scan = await scope.unit(
      folder,
      async () => {
        const loaded = await findCandidateTable(tablePath);
        if (!loaded) return undefined;

        const missingColumn = loaded.issues.find(issue => issue.kind === 'MissingColumn');
        if (missingColumn) throw new FormatError(missingColumn);
        return { valid: candidateCodes(loaded.table), snapshot: snapshotFolder(folderPath) };
      },
      tablePath
    );
    if (!scan) continue;

    for (const file of scan.snapshot.files) {
      const code = sourceContentCode(file.name, naming);
      if (code === undefined || scan.valid.has(code)) continue;

      await scope.unit(
        `${folder}/${file.name}`,
        () => {
          rmSync(file.path);
          scope.changed();
          scope.logger.info(`Deleted redundant ${file.name} in ${folder}`, { code });
        },
        file.path
      );
    }
  }

  return scope.finish();
}

export const cleanupStage: Stage = { number: 5, name: 'cleanup', title: TITLE, run };
