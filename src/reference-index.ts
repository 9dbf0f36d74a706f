/**
 * Reference index: which pages of the master document belong to which
 * document key. The text form has one `<document-key> <page>` pair per line.
 */

import { readFileSync } from 'fs';
import { FileIOError } from './errors.js';
import { errorMessage } from './logger.js';

export interface ReferenceIndex {
  /** Sorted, unique pages of every key containing `code` (case-insensitive) */
  pagesFor(code: string): number[];
  readonly size: number;
}

export class TextReferenceIndex implements ReferenceIndex {
  private pages = new Map<string, number[]>();

  static parse(content: string): TextReferenceIndex {
    const index = new TextReferenceIndex();
    for (const line of content.split(/\r?\n/)) {
      const [key, page] = line.trim().split(/\s+/);
      if (!key || !page || !/^\d+$/.test(page)) continue;
      index.add(key, Number.parseInt(page, 10));
    }
    return index;
  }

  add(key: string, page: number): void {
    const lowered = key.toLowerCase();
    const pages = this.pages.get(lowered);
    if (pages) {
      pages.push(page);
    } else {
      this.pages.set(lowered, [page]);
    }
  }

  get size(): number {
    return this.pages.size;
  }

  pagesFor(code: string): number[] {
    const needle = code.toLowerCase();
    const found = new Set<number>();
    for (const [key, pages] of this.pages) {
      if (!key.includes(needle)) continue;
      for (const page of pages) found.add(page);
    }
    return [...found].sort((a, b) => a - b);
  }
}

export function loadReferenceIndex(path: string): TextReferenceIndex {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new FileIOError(`Cannot read reference index ${path}: ${errorMessage(error)}`, path, error);
  }
  return TextReferenceIndex.parse(content);
}
