/**
 * Everything one pipeline run shares: resolved configuration, the logger
 * with its action-log and error-report sinks, open issues, and per-stage
 * bookkeeping.
 */

import { join } from 'path';
import type { AppConfig } from './config.js';
import { toUnitError } from './errors.js';
import { FileSink, Logger, type LogSink } from './logger.js';
import { MergeCache } from './merge-cache.js';
import type { SafeCopyOptions } from './safe-copy.js';

export interface RunPaths {
  entityTable: string;
  sourceStore: string;
  referenceIndex: string;
  masterDocument: string;
  destinationRoot: string;
}

export type StageName = 'reconcile' | 'candidates' | 'extract' | 'backup' | 'cleanup' | 'merge' | 'verify';

/**
 * Something an operator has to look at after the run
 */
export interface OpenIssue {
  stage: StageName;
  subject: string;
  message: string;
}

export interface StageReport {
  stage: StageName;
  title: string;
  units: number;
  changed: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

export interface RunContextOptions {
  /** Extra sinks, e.g. for tests */
  sinks?: LogSink[];
  /** Truncate the log files before the first entry (default true) */
  truncateLogs?: boolean;
}

export class RunContext {
  readonly logger: Logger;
  readonly issues: OpenIssue[] = [];
  readonly actionLog: FileSink;
  readonly errorReport: FileSink;

  constructor(
    readonly config: AppConfig,
    readonly paths: RunPaths,
    options: RunContextOptions = {}
  ) {
    this.actionLog = new FileSink(config.logging.actionLog, 'debug');
    this.errorReport = new FileSink(config.logging.errorReport, 'error');

    if (options.truncateLogs ?? true) {
      this.actionLog.truncate();
      this.errorReport.truncate();
    }

    this.logger = new Logger({
      context: 'run',
      level: config.logging.level,
      console: config.logging.console,
      sinks: [this.actionLog, this.errorReport, ...(options.sinks ?? [])],
    });
  }

  copyOptions(): SafeCopyOptions {
    return { identity: this.config.copy.identity, duplicateInfix: this.config.naming.duplicateInfix };
  }

  folderPath(folderName: string): string {
    return join(this.paths.destinationRoot, folderName);
  }

  candidateTablePath(folderName: string): string {
    return join(this.folderPath(folderName), this.config.naming.candidateTable);
  }

  mergeCache(folderName: string): MergeCache {
    return new MergeCache(this.folderPath(folderName), this.config.naming.cacheSidecar, this.logger.child('merge-cache'));
  }

  flagIssue(stage: StageName, subject: string, message: string): void {
    this.issues.push({ stage, subject, message });
    this.logger.warn(`Open issue: ${subject}: ${message}`, { stage });
  }

  stage(name: StageName, title: string): StageScope {
    return new StageScope(this, name, title);
  }
}

/**
 * Counters and failure isolation for one stage
 */
export class StageScope {
  readonly logger: Logger;
  private counts = { units: 0, changed: 0, skipped: 0, failed: 0 };
  private startedAt = Date.now();

  constructor(
    readonly context: RunContext,
    readonly name: StageName,
    readonly title: string
  ) {
    this.logger = context.logger.child(name);
    this.logger.info(`=== ${title} start ===`);
  }

  changed(count: number = 1): void {
    this.counts.changed += count;
  }

  skipped(count: number = 1): void {
    this.counts.skipped += count;
  }

  /**
   * Count units processed outside `unit()`
   */
  addUnits(count: number): void {
    this.counts.units += count;
  }

  /**
   * Record a failure of one unit without throwing
   */
  fail(subject: string, error: unknown, path: string = subject): void {
    const unitError = toUnitError(error, path);
    this.counts.failed++;
    this.logger.error(subject, unitError, { code: unitError.code });
  }

  /**
   * Run one unit of work. A thrown error is logged and counted; the stage
   * carries on with the next unit.
   */
  async unit<T>(subject: string, work: () => Promise<T> | T, path?: string): Promise<T | undefined> {
    this.counts.units++;
    try {
      return await work();
    } catch (error) {
      this.fail(subject, error, path);
      return undefined;
    }
  }

  flagIssue(subject: string, message: string): void {
    this.context.flagIssue(this.name, subject, message);
  }

  finish(): StageReport {
    const report: StageReport = {
      stage: this.name,
      title: this.title,
      ...this.counts,
      durationMs: Date.now() - this.startedAt,
    };
    this.logger.info(`=== ${this.title} end ===`, {
      units: report.units,
      changed: report.changed,
      skipped: report.skipped,
      failed: report.failed,
      durationMs: report.durationMs,
    });
    return report;
  }
}
