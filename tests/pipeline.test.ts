import { describe, it, expect, beforeEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, readFileSync, rmdirSync, rmSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { SetupError } from '../src/errors.js';
import { formatSummary, runPipeline } from '../src/pipeline.js';
import { readSheet } from '../src/spreadsheet.js';
import { ENTITY_HEADERS, labelFingerprints, pageFingerprints, writeLabelledPdf, writeTable } from './helpers/fixtures.js';
import { createWorkspace, type Workspace } from './helpers/workspace.js';

describe('runPipeline', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  it('should build every entity folder on the first run', async () => {
    const { dest, config } = workspace;

    const summary = await runPipeline(config);

    expect(summary.ok).toBe(2);
    expect(summary.missing).toBe(1);
    expect(summary.issues).toEqual([
      { stage: 'verify', subject: 'L3_S3', message: 'folder holds no documents (row 4)' },
    ]);
    expect(summary.stages.map(report => report.stage)).toEqual([
      'reconcile',
      'candidates',
      'extract',
      'backup',
      'cleanup',
      'merge',
      'verify',
    ]);

    expect(readdirSync(join(dest, 'L1_S1')).sort()).toEqual([
      '.merge-cache.json',
      '2.pdf',
      '2_FRI.pdf',
      '4.pdf',
      '4_FRI.pdf',
      'Combined.pdf',
      'Line (A-1-1).pdf',
      'Line (A-1-1)_FRI.pdf',
      'output.xlsx',
    ]);
    expect(readdirSync(join(dest, 'L3_S3'))).toEqual([]);

    expect(await pageFingerprints(join(dest, 'L1_S1', 'Combined.pdf'))).toEqual(
      await labelFingerprints(workspace.dir, ['M2', 'M4', 'SRC-A1', 'SRC-A2'])
    );

    const candidates = await readSheet(join(dest, 'L1_S1', 'output.xlsx'));
    expect(candidates.headers).toEqual(['ISO LIST', 'PDF PAGE', 'ISO Status']);
    expect(candidates.rows.map(row => row.values)).toEqual([['A-1', '2,4', 'OK']]);

    const entities = await readSheet(config.paths.entityTable ?? '');
    expect(entities.rows.map(row => row.values)).toEqual([
      ['A-1-1', 'L1', 'S1', 'L1_S1', 'L1_S1', 'OK'],
      ['B-2-1', 'L2', 'S2', 'L2_S2', 'L2_S2', 'OK'],
      ['Z-9-9', 'L3', 'S3', 'L3_S3', 'L3_S3', 'MISSING'],
    ]);
  });

  it('should write failures to the error report and everything to the action log', async () => {
    const { config } = workspace;
    await runPipeline(config);

    const errors = readFileSync(config.logging.errorReport, 'utf-8').trimEnd().split('\n');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(
      /ERROR \[reconcile\] row 4 Z-9-9 \{"code":"SOURCE_NOT_FOUND"\} \(No source document for Z-9-9\)$/
    );

    const actions = readFileSync(config.logging.actionLog, 'utf-8');
    expect(actions).toContain('=== P1: entity folders start ===');
    expect(actions).toContain('=== P7: verification end ===');
  });

  it('should change nothing on a second run', async () => {
    const { dest, config } = workspace;
    await runPipeline(config);
    const combined = readFileSync(join(dest, 'L1_S1', 'Combined.pdf'));
    const combinedMtime = statSync(join(dest, 'L1_S1', 'Combined.pdf')).mtimeMs;
    const cache = readFileSync(join(dest, 'L1_S1', '.merge-cache.json'), 'utf-8');

    const second = await runPipeline(config);

    expect(second.stages.map(report => [report.stage, report.changed])).toEqual([
      ['reconcile', 0],
      ['candidates', 0],
      ['extract', 0],
      ['backup', 0],
      ['cleanup', 0],
      ['merge', 0],
      ['verify', 0],
    ]);
    expect(readFileSync(join(dest, 'L1_S1', 'Combined.pdf')).equals(combined)).toBe(true);
    expect(statSync(join(dest, 'L1_S1', 'Combined.pdf')).mtimeMs).toBe(combinedMtime);
    expect(readFileSync(join(dest, 'L1_S1', '.merge-cache.json'), 'utf-8')).toBe(cache);
  });

  it('should not record the cache when the merged output cannot be written', async () => {
    const { dest, config } = workspace;
    await runPipeline(config, { stages: [1, 2, 3, 4, 5] });
    // A directory in the way of the temporary output file
    mkdirSync(join(dest, 'L1_S1', 'Combined.pdf.partial'));

    const failed = await runPipeline(config, { stages: [6] });

    expect(failed.stages[0]).toMatchObject({ changed: 1, skipped: 1, failed: 1 });
    expect(existsSync(join(dest, 'L1_S1', '.merge-cache.json'))).toBe(false);
    expect(existsSync(join(dest, 'L1_S1', 'Combined.pdf'))).toBe(false);
    expect(readFileSync(config.logging.errorReport, 'utf-8')).toContain('Cannot write PDF');

    rmdirSync(join(dest, 'L1_S1', 'Combined.pdf.partial'));
    const retried = await runPipeline(config, { stages: [6] });

    expect(retried.stages[0]).toMatchObject({ changed: 1, skipped: 2, failed: 0 });
    expect(existsSync(join(dest, 'L1_S1', '.merge-cache.json'))).toBe(true);
    expect(await pageFingerprints(join(dest, 'L1_S1', 'Combined.pdf'))).toEqual(
      await labelFingerprints(workspace.dir, ['M2', 'M4', 'SRC-A1', 'SRC-A2'])
    );
  });

  it('should re-merge only the folder whose candidates changed', async () => {
    const { dest, config } = workspace;
    await runPipeline(config);
    const untouched = readFileSync(join(dest, 'L2_S2', '.merge-cache.json'), 'utf-8');

    await writeLabelledPdf(join(dest, 'L1_S1', 'Line (A-1-1).pdf'), ['SRC-A1', 'SRC-A3']);
    const summary = await runPipeline(config, { stages: [6] });

    expect(summary.stages).toHaveLength(1);
    // L2_S2 is fresh and L3_S3 has nothing to merge
    expect(summary.stages[0]).toMatchObject({ stage: 'merge', changed: 1, skipped: 2, failed: 0 });
    expect(readFileSync(join(dest, 'L2_S2', '.merge-cache.json'), 'utf-8')).toBe(untouched);
    // The backup of the old original still contributes its unseen page
    expect(await pageFingerprints(join(dest, 'L1_S1', 'Combined.pdf'))).toEqual(
      await labelFingerprints(workspace.dir, ['M2', 'M4', 'SRC-A1', 'SRC-A3', 'SRC-A2'])
    );
  });

  it('should re-merge when the merged output was deleted', async () => {
    const { dest, config } = workspace;
    await runPipeline(config);
    rmSync(join(dest, 'L2_S2', 'Combined.pdf'));

    const summary = await runPipeline(config, { stages: [6] });

    expect(summary.stages[0]).toMatchObject({ changed: 1, skipped: 2 });
    expect(await pageFingerprints(join(dest, 'L2_S2', 'Combined.pdf'))).toEqual(
      await labelFingerprints(workspace.dir, ['M5', 'SRC-B1'])
    );
  });

  it('should merge two history folders of one entity', async () => {
    const { dir, dest, config } = workspace;
    mkdirSync(join(dest, 'L1_Sold_a'));
    mkdirSync(join(dest, 'L1_Sold_b'));
    writeFileSync(join(dest, 'L1_Sold_a', 'note.pdf'), 'first');
    writeFileSync(join(dest, 'L1_Sold_b', 'note.pdf'), 'second');
    await writeTable(join(dir, 'loops.xlsx'), ENTITY_HEADERS, [
      ['', 'L1', 'S1', '', 'L1_Sold_a', ''],
      ['', 'L1', 'S1', '', 'L1_Sold_b', ''],
    ]);

    const summary = await runPipeline(config, { stages: [1] });

    expect(summary.stages[0]).toMatchObject({ stage: 'reconcile', changed: 2, failed: 0 });
    expect(readdirSync(dest).sort()).toEqual(['L1_S1']);
    expect(readdirSync(join(dest, 'L1_S1')).sort()).toEqual(['note.pdf', 'note_dup1.pdf']);
    const entities = await readSheet(config.paths.entityTable ?? '');
    expect(entities.rows.map(row => row.values[4])).toEqual(['L1_S1', 'L1_S1']);
  });

  it('should remove empty folders no entity names', async () => {
    const { dest, config } = workspace;
    mkdirSync(join(dest, 'stale_folder'));
    mkdirSync(join(dest, 'kept_folder'));
    writeFileSync(join(dest, 'kept_folder', 'readme.txt'), 'x');

    const summary = await runPipeline(config, { stages: [7] });

    expect(existsSync(join(dest, 'stale_folder'))).toBe(false);
    expect(existsSync(join(dest, 'kept_folder'))).toBe(true);
    expect(summary.stages[0].changed).toBe(1);
  });

  it('should format a summary', async () => {
    const summary = await runPipeline(workspace.config);
    const text = formatSummary(summary);
    expect(text.split('\n').slice(0, 4)).toEqual([
      'OK: 2',
      'MISSING: 1',
      'Open issues: 1',
      '  - [verify] L3_S3: folder holds no documents (row 4)',
    ]);
  });
});

describe('runPipeline setup', () => {
  it('should fail before touching anything when the master document is missing', async () => {
    const { dir, dest, config } = await createWorkspace();
    config.paths.masterDocument = join(dir, 'absent.pdf');
    const tableBefore = readFileSync(join(dir, 'loops.xlsx'));

    await expect(runPipeline(config)).rejects.toBeInstanceOf(SetupError);
    expect(readdirSync(dest)).toEqual([]);
    expect(readFileSync(join(dir, 'loops.xlsx')).equals(tableBefore)).toBe(true);
    expect(readFileSync(config.logging.errorReport, 'utf-8')).toContain('Setup failed');
  });

  it('should create a template entity table and stop', async () => {
    const { dir, dest, config } = await createWorkspace();
    config.paths.entityTable = join(dir, 'new-loops.xlsx');

    await expect(runPipeline(config)).rejects.toThrow('Entity table not found; created a template');
    expect((await readSheet(join(dir, 'new-loops.xlsx'))).headers).toEqual(ENTITY_HEADERS);
    expect(readdirSync(dest)).toEqual([]);
  });

  it('should reject unknown stage numbers', async () => {
    const { config } = await createWorkspace();
    await expect(runPipeline(config, { stages: [8] })).rejects.toThrow('Unknown stage numbers: 8 (expected 1-7)');
  });
});
