/**
 * Immutable directory listings, captured once per stage before any mutation
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { basename, join } from 'path';
import { FileIOError } from './errors.js';
import { errorMessage } from './logger.js';

export interface FileEntry {
  readonly name: string;
  readonly path: string;
  readonly size: number;
  readonly mtimeMs: number;
}

export interface FolderSnapshot {
  readonly name: string;
  readonly path: string;
  readonly files: readonly FileEntry[];
  readonly directories: readonly string[];
}

export function snapshotFolder(folderPath: string): FolderSnapshot {
  let names: string[];
  try {
    names = readdirSync(folderPath).sort();
  } catch (error) {
    throw new FileIOError(`Cannot list ${folderPath}: ${errorMessage(error)}`, folderPath, error);
  }

  const files: FileEntry[] = [];
  const directories: string[] = [];

  for (const name of names) {
    const path = join(folderPath, name);
    const stats = statSync(path, { throwIfNoEntry: false });
    if (!stats) continue;
    if (stats.isDirectory()) {
      directories.push(name);
    } else if (stats.isFile()) {
      files.push(Object.freeze({ name, path, size: stats.size, mtimeMs: stats.mtimeMs }));
    }
  }

  return Object.freeze({
    name: basename(folderPath),
    path: folderPath,
    files: Object.freeze(files),
    directories: Object.freeze(directories)
  });
}

/**
 * Names of the direct child folders of the destination root, sorted
 */
export function listEntityFolders(root: string): readonly string[] {
  if (!existsSync(root)) return [];
  return snapshotFolder(root).directories;
}

export function hasFile(snapshot: FolderSnapshot, fileName: string): boolean {
  const lowered = fileName.toLowerCase();
  return snapshot.files.some(file => file.name.toLowerCase() === lowered);
}
