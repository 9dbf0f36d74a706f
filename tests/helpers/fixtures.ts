import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { pageFingerprint } from '../../src/content-hasher.js';
import { DEFAULT_CONFIG, type AppConfig } from '../../src/config.js';
import { loadPdf } from '../../src/pdf-documents.js';
import { writeSheet } from '../../src/spreadsheet.js';

/**
 * Fresh directory under `.test-tmp`, unique per call
 */
export function makeTempDir(prefix: string): string {
  const base = join(process.cwd(), '.test-tmp');
  mkdirSync(base, { recursive: true });
  return mkdtempSync(join(base, `${prefix}-`));
}

/**
 * Write a PDF with one page per label; each page shows its label
 */
export async function writeLabelledPdf(path: string, labels: readonly string[]): Promise<void> {
  const document = await PDFDocument.create({ updateMetadata: false });
  const font = await document.embedFont(StandardFonts.Helvetica);
  for (const label of labels) {
    const page = document.addPage([300, 200]);
    page.drawText(label, { x: 40, y: 100, size: 24, font });
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, await document.save());
}

/**
 * Fingerprints of every page of a PDF on disk, in page order
 */
export async function pageFingerprints(path: string): Promise<string[]> {
  const document = await loadPdf(path);
  return document.getPages().map(page => pageFingerprint(page));
}

/**
 * Fingerprints of pages showing the given labels, as written by `writeLabelledPdf`
 */
export async function labelFingerprints(dir: string, labels: readonly string[]): Promise<string[]> {
  const path = join(dir, `reference-${labels.join('-')}.pdf`);
  await writeLabelledPdf(path, labels);
  return pageFingerprints(path);
}

export async function writeTable(path: string, headers: string[], rows: string[][]): Promise<void> {
  mkdirSync(dirname(path), { recursive: true });
  await writeSheet(path, {
    headers,
    rows: rows.map((values, index) => ({ number: index + 2, values })),
  });
}

export const ENTITY_HEADERS = ['Iso no', 'loop no', 'system no', 'folder name', 'history folder name', 'ISO Status'];

/**
 * Default configuration with quiet logging into `dir`
 */
export function testConfig(dir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.logging = {
    ...config.logging,
    level: 'debug',
    console: false,
    actionLog: join(dir, 'logs', 'orchestrator_log.txt'),
    errorReport: join(dir, 'logs', 'error_report.txt'),
  };
  return { ...config, ...overrides };
}
