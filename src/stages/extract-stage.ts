import { join } from 'path';
import { CANDIDATE_SCHEMA, findCandidateTable, parsePageList } from '../candidate-table.js';
import { FormatError } from '../errors.js';
import type { SchemaIssue } from '../errors.js';
import { hasFile, listEntityFolders, snapshotFolder } from '../folder-snapshot.js';
import { extractedFileName } from '../naming.js';
import { extractPage, writePdf } from '../pdf-documents.js';
import type { RunContext, StageReport } from '../run-context.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P3: page extraction';

/**
 * P3: write every master page a folder's candidate table names to
 * `<page>.pdf`. Pages already on disk are left alone.
 */
async function run(context: RunContext, state: PipelineState): Promise<StageReport> {
  const scope = context.stage('extract', TITLE);
  const pageCount = state.master.getPageCount();

  for (const folder of listEntityFolders(context.paths.destinationRoot)) {
    const folderPath = context.folderPath(folder);
    const tablePath = context.candidateTablePath(folder);

    const plan = await scope.unit(
      folder,
      async () => {
        const loaded = await findCandidateTable(tablePath);
        if (!loaded) return undefined;

        const wanted = new Set<number>();
        const issues: SchemaIssue[] = [...loaded.issues.filter(issue => issue.kind === 'MissingColumn')];
        for (const row of loaded.table.rows) {
          const parsed = parsePageList(row.pages, row.row);
          issues.push(...parsed.issues);
          for (const page of parsed.pages) {
            if (page > pageCount) {
              issues.push({
                kind: 'BadValue',
                table: CANDIDATE_SCHEMA.table,
                column: 'PDF PAGE',
                row: row.row,
                value: String(page),
                reason: `master document has ${pageCount} pages`,
              });
              continue;
            }
            wanted.add(page);
          }
        }

        for (const issue of issues) {
          scope.fail(`${folder}: candidate table`, new FormatError(issue), tablePath);
        }
        return { pages: [...wanted].sort((a, b) => a - b), snapshot: snapshotFolder(folderPath) };
      },
      tablePath
    );
    if (!plan) continue;

    for (const page of plan.pages) {
      const fileName = extractedFileName(page);
      if (hasFile(plan.snapshot, fileName)) {
        scope.skipped();
        continue;
      }

      const target = join(folderPath, fileName);
      await scope.unit(
        `${folder}/${fileName}`,
        async () => {
          await writePdf(await extractPage(state.master, page), target);
          scope.changed();
          scope.logger.debug(`Extracted page ${page} into ${folder}`);
        },
        target
      );
    }
  }

  return scope.finish();
}

export const extractStage: Stage = { number: 3, name: 'extract', title: TITLE, run };
