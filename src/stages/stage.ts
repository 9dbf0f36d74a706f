import type { PDFDocument } from 'pdf-lib';
import type { EntityTable } from '../entity-table.js';
import type { ReferenceIndex } from '../reference-index.js';
import type { RunContext, StageName, StageReport } from '../run-context.js';
import type { SourceStore } from '../source-store.js';

/**
 * Inputs opened during setup and shared by the stages.
 * Stage 1 replaces `table` with the reconciled one.
 */
export interface PipelineState {
  table: EntityTable;
  store: SourceStore;
  index: ReferenceIndex;
  master: PDFDocument;
}

export interface Stage {
  number: number;
  name: StageName;
  title: string;
  run(context: RunContext, state: PipelineState): Promise<StageReport>;
}
