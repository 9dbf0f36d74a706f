import { join } from 'path';
import { folderFingerprint } from '../content-hasher.js';
import { hasFile, listEntityFolders, snapshotFolder } from '../folder-snapshot.js';
import { buildMergedDocument, orderCandidates } from '../page-dedup.js';
import { writePdf } from '../pdf-documents.js';
import type { RunContext, StageReport } from '../run-context.js';
import type { PipelineState, Stage } from './stage.js';

const TITLE = 'P6: merge';

/**
 * Settings that change the merged bytes for the same inputs
 */
export function mergeSalt(context: RunContext): string {
  return `skipDuplicatePages=${context.config.merge.skipDuplicatePages}`;
}

/**
 * P6: one deduplicated merged document per folder, rebuilt only when the
 * fingerprint of its candidate files differs from the cached one or the
 * output is gone.
 */
async function run(context: RunContext, _state: PipelineState): Promise<StageReport> {
  const scope = context.stage('merge', TITLE);
  const { naming, merge } = context.config;

  for (const folder of listEntityFolders(context.paths.destinationRoot)) {
    const folderPath = context.folderPath(folder);
    const outputPath = join(folderPath, naming.mergedOutput);

    await scope.unit(
      folder,
      async () => {
        const snapshot = snapshotFolder(folderPath);
        const candidates = orderCandidates(snapshot.files, naming);
        if (candidates.length === 0) {
          scope.skipped();
          return;
        }

        const fingerprint = folderFingerprint(candidates, mergeSalt(context));
        const cache = context.mergeCache(folder);
        if (cache.isFresh(fingerprint) && hasFile(snapshot, naming.mergedOutput)) {
          scope.skipped();
          scope.logger.debug(`Merge up to date: ${folder}`);
          return;
        }

        const result = await buildMergedDocument(candidates, { skipDuplicatePages: merge.skipDuplicatePages });
        for (const source of result.sources) {
          if (source.error) {
            scope.fail(`${folder}/${source.name}`, source.error, join(folderPath, source.name));
          } else if (source.pagesKept === 0 && source.pagesSkipped > 0) {
            scope.logger.info(`All pages of ${source.name} already merged`, { folder });
          }
        }

        if (result.pagesKept === 0) {
          scope.logger.warn(`Nothing to merge in ${folder}`);
          scope.skipped();
          return;
        }

        const bytes = await writePdf(result.document, outputPath);
        cache.record(fingerprint);
        scope.changed();
        scope.logger.info(`Merged ${folder}`, {
          pages: result.pagesKept,
          duplicatesSkipped: result.pagesSkipped,
          bytes,
        });
      },
      outputPath
    );
  }

  return scope.finish();
}

export const mergeStage: Stage = { number: 6, name: 'merge', title: TITLE, run };
