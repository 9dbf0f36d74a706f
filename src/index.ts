/**
 * Library entry point for the loop folder synchronization engine
 */

export { runPipeline, formatSummary, resolvePaths, selectStages, STAGES } from './pipeline.js';
export type { PipelineOptions, RunSummary } from './pipeline.js';
export { RunContext, StageScope } from './run-context.js';
export type { OpenIssue, RunPaths, StageName, StageReport } from './run-context.js';
export { ConfigManager, DEFAULT_CONFIG, createExampleConfig } from './config.js';
export type { AppConfig, NamingConfig, PathsConfig } from './config.js';
export { Logger, FileSink, AppError, logger } from './logger.js';
export { SetupError, LookupError, FileIOError, FormatError, describeIssue } from './errors.js';
export type { SchemaIssue } from './errors.js';
export { safeCopy } from './safe-copy.js';
export type { SafeCopyOptions, SafeCopyResult } from './safe-copy.js';
export { pageFingerprint, folderFingerprint } from './content-hasher.js';
export { buildMergedDocument, orderCandidates } from './page-dedup.js';
export { MergeCache } from './merge-cache.js';
export { planReconciliation, applyReconciliation } from './entity-registry.js';
export type { ReconcileStep } from './entity-registry.js';
export { loadEntityTable, saveEntityTable, prepareEntityTable } from './entity-table.js';
export type { Entity, EntityTable, EntityStatus } from './entity-table.js';
export { loadCandidateTable, saveCandidateTable } from './candidate-table.js';
export type { CandidateRow, CandidateTable } from './candidate-table.js';
export { TextReferenceIndex, loadReferenceIndex } from './reference-index.js';
export type { ReferenceIndex } from './reference-index.js';
export { SourceStore } from './source-store.js';
