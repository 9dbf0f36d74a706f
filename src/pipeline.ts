/**
 * Seven-stage synchronization run.
 *
 * Setup opens every input once and fails with a SetupError before any
 * folder is touched. The stages then run strictly in order; each one
 * isolates failures per unit and returns a report.
 */

import { statSync } from 'fs';
import type { PDFDocument } from 'pdf-lib';
import type { AppConfig, PathsConfig } from './config.js';
import { countStatuses, prepareEntityTable } from './entity-table.js';
import { describeIssue, FormatError, SetupError } from './errors.js';
import { errorMessage, type LogSink } from './logger.js';
import { loadPdf } from './pdf-documents.js';
import { loadReferenceIndex, type ReferenceIndex } from './reference-index.js';
import { RunContext, type OpenIssue, type RunPaths, type StageReport } from './run-context.js';
import { SourceStore } from './source-store.js';
import { backupStage } from './stages/backup-stage.js';
import { candidateStage } from './stages/candidate-stage.js';
import { cleanupStage } from './stages/cleanup-stage.js';
import { extractStage } from './stages/extract-stage.js';
import { mergeStage } from './stages/merge-stage.js';
import { reconcileStage } from './stages/reconcile-stage.js';
import type { PipelineState, Stage } from './stages/stage.js';
import { verifyStage } from './stages/verify-stage.js';

export const STAGES: readonly Stage[] = [
  reconcileStage,
  candidateStage,
  extractStage,
  backupStage,
  cleanupStage,
  mergeStage,
  verifyStage,
];

export interface PipelineOptions {
  /** Stage numbers to run (1-7); all stages when omitted */
  stages?: readonly number[];
  sinks?: LogSink[];
}

export interface RunSummary {
  ok: number;
  missing: number;
  issues: OpenIssue[];
  stages: StageReport[];
  durationMs: number;
}

const PATH_LABELS: Record<keyof PathsConfig, string> = {
  entityTable: 'entity table',
  sourceStore: 'source store',
  referenceIndex: 'reference index',
  masterDocument: 'master document',
  destinationRoot: 'destination root',
};

/**
 * Every path a run needs, or a SetupError naming the ones not configured
 */
export function resolvePaths(paths: PathsConfig): RunPaths {
  const { entityTable, sourceStore, referenceIndex, masterDocument, destinationRoot } = paths;
  if (entityTable && sourceStore && referenceIndex && masterDocument && destinationRoot) {
    return { entityTable, sourceStore, referenceIndex, masterDocument, destinationRoot };
  }

  const missing = Object.entries(PATH_LABELS)
    .filter(([key]) => !Reflect.get(paths, key))
    .map(([, label]) => label);
  throw new SetupError(`Missing required paths: ${missing.join(', ')}`, { missing });
}

export function selectStages(numbers?: readonly number[]): Stage[] {
  if (!numbers || numbers.length === 0) return [...STAGES];

  const unknown = numbers.filter(number => !STAGES.some(stage => stage.number === number));
  if (unknown.length > 0) {
    throw new SetupError(`Unknown stage numbers: ${unknown.join(', ')} (expected 1-${STAGES.length})`);
  }
  return STAGES.filter(stage => numbers.includes(stage.number));
}

function requireDirectory(path: string, label: string): void {
  const stats = statSync(path, { throwIfNoEntry: false });
  if (!stats || !stats.isDirectory()) {
    throw new SetupError(`${label} is not a directory: ${path}`, { path });
  }
}

async function openMaster(path: string): Promise<PDFDocument> {
  try {
    return await loadPdf(path);
  } catch (error) {
    throw new SetupError(`Master document cannot be opened: ${errorMessage(error)}`, { path });
  }
}

function openIndex(path: string): ReferenceIndex {
  try {
    return loadReferenceIndex(path);
  } catch (error) {
    throw new SetupError(`Reference index cannot be read: ${errorMessage(error)}`, { path });
  }
}

async function openStore(path: string, recursive: boolean): Promise<SourceStore> {
  requireDirectory(path, 'Source store');
  try {
    return await SourceStore.open(path, { recursive });
  } catch (error) {
    throw new SetupError(`Source store cannot be indexed: ${errorMessage(error)}`, { path });
  }
}

/**
 * Open every input. Nothing under the destination root is changed here.
 */
async function setup(context: RunContext): Promise<PipelineState> {
  const { paths, config, logger } = context;

  requireDirectory(paths.destinationRoot, 'Destination root');
  const store = await openStore(paths.sourceStore, config.sourceStore.recursive);
  const index = openIndex(paths.referenceIndex);
  const master = await openMaster(paths.masterDocument);
  const { table, issues } = await prepareEntityTable(paths.entityTable);

  for (const issue of issues) {
    logger.error(describeIssue(issue), new FormatError(issue));
  }

  logger.info('Inputs opened', {
    entities: table.entities.length,
    sourceDocuments: store.size,
    indexKeys: index.size,
    masterPages: master.getPageCount(),
  });

  return { table, store, index, master };
}

async function runStage(context: RunContext, stage: Stage, state: PipelineState): Promise<StageReport> {
  const startedAt = Date.now();
  try {
    return await stage.run(context, state);
  } catch (error) {
    context.logger.error(`${stage.title} aborted`, error instanceof Error ? error : new Error(String(error)));
    return {
      stage: stage.name,
      title: stage.title,
      units: 0,
      changed: 0,
      skipped: 0,
      failed: 1,
      durationMs: Date.now() - startedAt,
    };
  }
}

export async function runPipeline(config: AppConfig, options: PipelineOptions = {}): Promise<RunSummary> {
  const startedAt = Date.now();
  const paths = resolvePaths(config.paths);
  const stages = selectStages(options.stages);
  const context = new RunContext(config, paths, { sinks: options.sinks });
  const { logger } = context;

  logger.info('Run started', { stages: stages.map(stage => stage.number) });

  let state: PipelineState;
  try {
    state = await setup(context);
  } catch (error) {
    if (error instanceof SetupError) {
      logger.error('Setup failed', error);
    }
    throw error;
  }

  const reports: StageReport[] = [];
  for (const stage of stages) {
    reports.push(await runStage(context, stage, state));
  }

  const counts = countStatuses(state.table.entities);
  const summary: RunSummary = {
    ok: counts.ok,
    missing: counts.missing,
    issues: [...context.issues],
    stages: reports,
    durationMs: Date.now() - startedAt,
  };

  logger.info('Run finished', {
    ok: summary.ok,
    missing: summary.missing,
    openIssues: summary.issues.length,
    durationMs: summary.durationMs,
  });
  return summary;
}

export function formatSummary(summary: RunSummary): string {
  const lines = [
    `OK: ${summary.ok}`,
    `MISSING: ${summary.missing}`,
    `Open issues: ${summary.issues.length}`,
    ...summary.issues.map(issue => `  - [${issue.stage}] ${issue.subject}: ${issue.message}`),
    'Stages:',
    ...summary.stages.map(
      report =>
        `  ${report.title}: ${report.changed} changed, ${report.skipped} skipped, ${report.failed} failed (${report.durationMs} ms)`
    ),
  ];
  return lines.join('\n');
}
