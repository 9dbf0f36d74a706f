/**
 * Read-only source store: the folder that holds the source originals.
 * It is indexed once per run; lookups match `(<code>)` in the file name.
 */

import { statSync } from 'fs';
import { basename } from 'path';
import glob from 'fast-glob';
import { FileIOError } from './errors.js';

export interface SourceDocument {
  name: string;
  path: string;
}

export interface SourceStoreOptions {
  /** Also index PDFs in subfolders */
  recursive?: boolean;
}

export class SourceStore {
  private constructor(
    readonly root: string,
    private documents: readonly SourceDocument[]
  ) {}

  static async open(root: string, options: SourceStoreOptions = {}): Promise<SourceStore> {
    const stats = statSync(root, { throwIfNoEntry: false });
    if (!stats || !stats.isDirectory()) {
      throw new FileIOError(`Source store is not a directory: ${root}`, root);
    }

    const paths = await glob(options.recursive ? '**/*.pdf' : '*.pdf', {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      caseSensitiveMatch: false,
      followSymbolicLinks: false,
      unique: true,
      suppressErrors: true,
    });

    const documents = paths.sort().map(path => ({ name: basename(path), path }));
    return new SourceStore(root, documents);
  }

  get size(): number {
    return this.documents.length;
  }

  /**
   * First document, in path order, whose name contains `(<code>)`
   */
  find(code: string): SourceDocument | undefined {
    const needle = `(${code.trim().toLowerCase()})`;
    if (needle === '()') return undefined;
    return this.documents.find(document => document.name.toLowerCase().includes(needle));
  }
}
