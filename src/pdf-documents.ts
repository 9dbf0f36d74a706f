/**
 * PDF loading and writing
 */

import { readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import { PDFDocument } from 'pdf-lib';
import { FileIOError } from './errors.js';
import { errorMessage } from './logger.js';

export async function loadPdf(path: string): Promise<PDFDocument> {
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    throw new FileIOError(`Cannot read ${path}: ${errorMessage(error)}`, path, error);
  }

  try {
    return await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
  } catch (error) {
    throw new FileIOError(`Cannot parse PDF ${path}: ${errorMessage(error)}`, path, error);
  }
}

export async function createPdf(): Promise<PDFDocument> {
  return PDFDocument.create({ updateMetadata: false });
}

/**
 * Write a document through a temporary sibling and rename it into place.
 * Resolves with the byte size once the file on disk has that size.
 */
export async function writePdf(document: PDFDocument, path: string): Promise<number> {
  const temporary = `${path}.partial`;

  try {
    const bytes = await document.save();
    writeFileSync(temporary, bytes);
    renameSync(temporary, path);

    const written = statSync(path).size;
    if (written !== bytes.length) {
      throw new Error(`expected ${bytes.length} bytes, found ${written}`);
    }
    return written;
  } catch (error) {
    if (statSync(temporary, { throwIfNoEntry: false })?.isFile()) {
      rmSync(temporary);
    }
    throw new FileIOError(`Cannot write PDF ${path}: ${errorMessage(error)}`, path, error);
  }
}

/**
 * Single-page document holding a copy of `pageNumber` (1-based) of `source`
 */
export async function extractPage(source: PDFDocument, pageNumber: number): Promise<PDFDocument> {
  const target = await createPdf();
  const [page] = await target.copyPages(source, [pageNumber - 1]);
  target.addPage(page);
  return target;
}
