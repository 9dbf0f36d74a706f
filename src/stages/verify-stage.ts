import { existsSync, rmdirSync } from 'fs';
import { findCandidateTable, saveCandidateTable } from '../candidate-table.js';
import { hasIdentity } from '../entity-table.js';
import { FormatError } from '../errors.js';
import { listEntityFolders, snapshotFolder } from '../folder-snapshot.js';
import { classifyDocument, sourceContentCode } from '../naming.js';
import type { RunContext, StageReport } from '../run-context.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P7: verification';

/**
 * P7: mark each candidate row OK or MISSING by whether a source original
 * with that code is in the folder, flag entity folders without documents,
 * and remove empty folders that no entity names.
 */
async function run(context: RunContext, state: PipelineState): Promise<StageReport> {
  const scope = context.stage('verify', TITLE);
  const { naming } = context.config;
  const root = context.paths.destinationRoot;
  const folders = listEntityFolders(root);

  for (const folder of folders) {
    const folderPath = context.folderPath(folder);
    const tablePath = context.candidateTablePath(folder);

    await scope.unit(
      folder,
      async () => {
        const loaded = await findCandidateTable(tablePath);
        if (!loaded) return;

        const missingColumn = loaded.issues.find(issue => issue.kind === 'MissingColumn');
        if (missingColumn) throw new FormatError(missingColumn);

        const present = new Set<string>();
        for (const file of snapshotFolder(folderPath).files) {
          const code = sourceContentCode(file.name, naming);
          if (code) present.add(code);
        }

        let updates = 0;
        const { table } = loaded;
        table.rows = table.rows.map(row => {
          const status = present.has(row.code) ? 'ok' : 'missing';
          if (status !== row.status) updates++;
          return { ...row, status };
        });

        const missing = table.rows.filter(row => row.status === 'missing').map(row => row.code);
        if (missing.length > 0) {
          scope.logger.warn(`Missing in ${folder}: ${missing.join(', ')}`);
        }

        if (updates === 0) {
          scope.skipped();
          return;
        }
        await saveCandidateTable(table);
        scope.changed();
      },
      tablePath
    );
  }

  const owned = new Set<string>();
  for (const entity of state.table.entities) {
    if (!hasIdentity(entity) || owned.has(entity.folderName)) continue;
    owned.add(entity.folderName);

    const folderPath = context.folderPath(entity.folderName);
    await scope.unit(
      entity.folderName,
      () => {
        const documents = existsSync(folderPath)
          ? snapshotFolder(folderPath).files.filter(file => classifyDocument(file.name, naming) !== undefined)
          : [];
        if (documents.length === 0) {
          scope.flagIssue(entity.folderName, `folder holds no documents (row ${entity.row})`);
        }
      },
      folderPath
    );
  }

  for (const folder of folders) {
    if (owned.has(folder)) continue;
    const folderPath = context.folderPath(folder);

    await scope.unit(
      folder,
      () => {
        const snapshot = snapshotFolder(folderPath);
        if (snapshot.files.length > 0 || snapshot.directories.length > 0) return;
        rmdirSync(folderPath);
        scope.changed();
        scope.logger.info(`Removed empty folder ${folder}`);
      },
      folderPath
    );
  }

  return scope.finish();
}

export const verifyStage: Stage = { number: 7, name: 'verify', title: TITLE, run };
