/**
 * Naming conventions that carry document roles and folder identities.
 * Roles are never stored; they are read back from file names.
 */

import { extname } from 'path';
import type { NamingConfig } from './config.js';

export type DocumentRole = 'merged-output' | 'extracted-range' | 'backup-copy' | 'source-original';

const SOURCE_CODE_PATTERN = /\(([^)]+)\)\.pdf$/i;
const EXTRACTED_PATTERN = /^(\d+)\.pdf$/i;

export function isPdf(fileName: string): boolean {
  return extname(fileName).toLowerCase() === '.pdf';
}

/**
 * Folder name for an entity: trimmed loop and system keys joined by `_`
 */
export function makeFolderName(loop: string, system: string): string {
  return `${loop.trim()}_${system.trim()}`;
}

export function splitExtension(fileName: string): { base: string; ext: string } {
  const ext = extname(fileName);
  return { base: fileName.slice(0, fileName.length - ext.length), ext };
}

export function isBackupName(fileName: string, naming: NamingConfig): boolean {
  return splitExtension(fileName).base.toLowerCase().endsWith(naming.backupSuffix.toLowerCase());
}

export function backupNameFor(fileName: string, naming: NamingConfig): string {
  const { base, ext } = splitExtension(fileName);
  return `${base}${naming.backupSuffix}${ext}`;
}

/**
 * Page number of an extracted-range file (`12.pdf` → 12)
 */
export function extractedPageNumber(fileName: string): number | undefined {
  const match = EXTRACTED_PATTERN.exec(fileName);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function extractedFileName(page: number): string {
  return `${page}.pdf`;
}

/**
 * Role of a PDF inside an entity folder, or undefined for non-PDF files
 */
export function classifyDocument(fileName: string, naming: NamingConfig): DocumentRole | undefined {
  if (!isPdf(fileName)) return undefined;
  if (fileName.toLowerCase() === naming.mergedOutput.toLowerCase()) return 'merged-output';
  if (extractedPageNumber(fileName) !== undefined) return 'extracted-range';
  if (isBackupName(fileName, naming)) return 'backup-copy';
  return 'source-original';
}

/**
 * Raw code in parentheses at the end of a source file name:
 * `P&ID (A-1-1).pdf` → `A-1-1`
 */
export function sourceCodeOf(fileName: string): string | undefined {
  const match = SOURCE_CODE_PATTERN.exec(fileName);
  return match ? match[1].trim() : undefined;
}

/**
 * Content code: the first two hyphen-separated segments of the raw code.
 * Codes with a single segment have no content code.
 */
export function contentCodeOf(fileName: string): string | undefined {
  const raw = sourceCodeOf(fileName);
  if (!raw) return undefined;
  const segments = raw.split('-');
  return segments.length >= 2 ? `${segments[0]}-${segments[1]}` : undefined;
}

/**
 * Content code of a source original, ignoring every other role
 */
export function sourceContentCode(fileName: string, naming: NamingConfig): string | undefined {
  return classifyDocument(fileName, naming) === 'source-original' ? contentCodeOf(fileName) : undefined;
}
