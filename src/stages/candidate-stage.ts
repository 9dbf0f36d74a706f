import {
  candidateCodes,
  emptyCandidateTable,
  findCandidateTable,
  formatPageList,
  saveCandidateTable,
} from '../candidate-table.js';
import { FormatError } from '../errors.js';
import { listEntityFolders, snapshotFolder } from '../folder-snapshot.js';
import { sourceContentCode } from '../naming.js';
import type { RunContext, StageReport } from '../run-context.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P2: candidate tables';

/**
 * P2: list the content codes present in each folder in its candidate
 * table, with the master pages the reference index gives for each code.
 * Rows already in a table are never rewritten; new codes are appended.
 */
async function run(context: RunContext, state: PipelineState): Promise<StageReport> {
  const scope = context.stage('candidates', TITLE);
  const { naming } = context.config;

  for (const folder of listEntityFolders(context.paths.destinationRoot)) {
    const folderPath = context.folderPath(folder);

    await scope.unit(
      folder,
      async () => {
        const snapshot = snapshotFolder(folderPath);
        const codes = new Set<string>();
        for (const file of snapshot.files) {
          const code = sourceContentCode(file.name, naming);
          if (code) codes.add(code);
        }
        if (codes.size === 0) {
          scope.skipped();
          return;
        }

        const tablePath = context.candidateTablePath(folder);
        const loaded = await findCandidateTable(tablePath);
        const missingColumn = loaded?.issues.find(issue => issue.kind === 'MissingColumn');
        if (missingColumn) {
          throw new FormatError(missingColumn);
        }

        const table = loaded?.table ?? emptyCandidateTable(tablePath);
        const known = candidateCodes(table);
        const added = [...codes].filter(code => !known.has(code)).sort();
        if (added.length === 0) {
          scope.skipped();
          return;
        }

        for (const code of added) {
          const pages = state.index.pagesFor(code);
          if (pages.length === 0) {
            scope.logger.warn(`No reference pages for ${code}`, { folder });
          }
          table.rows.push({ row: 0, code, pages: formatPageList(pages), status: 'unknown', extra: {} });
        }

        await saveCandidateTable(table);
        scope.changed();
        scope.logger.info(`Candidate table updated: ${folder}`, { added });
      },
      folderPath
    );
  }

  return scope.finish();
}

export const candidateStage: Stage = { number: 2, name: 'candidates', title: TITLE, run };
