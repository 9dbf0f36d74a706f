/**
 * Collision-safe copy: never overwrites an existing file whose identity
 * differs from the source. Candidates are `name.ext`, `name_dup1.ext`,
 * `name_dup2.ext`, ... and the first free one receives the copy.
 */

import { constants, copyFileSync, mkdirSync, readFileSync, rmSync, statSync, utimesSync } from 'fs';
import { basename, dirname, join } from 'path';
import { createHash } from 'crypto';
import type { CopyIdentity } from './config.js';
import { FileIOError, LookupError } from './errors.js';
import { errorMessage } from './logger.js';
import { splitExtension } from './naming.js';

export interface SafeCopyOptions {
  identity?: CopyIdentity;
  duplicateInfix?: string;
}

export interface SafeCopyResult {
  path: string;
  status: 'copied' | 'identical';
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function fileDigest(path: string): string {
  return createHash('sha256').update(readFileSync(path)).digest('hex');
}

/**
 * The `n`-th candidate name for `dst` (0 is `dst` itself)
 */
export function candidatePath(dst: string, n: number, duplicateInfix: string = '_dup'): string {
  if (n === 0) return dst;
  const { base, ext } = splitExtension(basename(dst));
  return join(dirname(dst), `${base}${duplicateInfix}${n}${ext}`);
}

export function safeCopy(src: string, dst: string, options: SafeCopyOptions = {}): SafeCopyResult {
  const identity = options.identity ?? 'size';
  const infix = options.duplicateInfix ?? '_dup';

  const sourceStats = statSync(src, { throwIfNoEntry: false });
  if (!sourceStats || !sourceStats.isFile()) {
    throw new LookupError(`Source file not found: ${src}`, 'SOURCE_NOT_FOUND', { path: src });
  }

  try {
    mkdirSync(dirname(dst), { recursive: true });
  } catch (error) {
    throw new FileIOError(`Cannot create ${dirname(dst)}: ${errorMessage(error)}`, dirname(dst), error);
  }

  let sourceDigest: string | undefined;
  const sameContent = (candidate: string, size: number): boolean => {
    if (size !== sourceStats.size) return false;
    if (identity === 'size') return true;
    sourceDigest ??= fileDigest(src);
    return fileDigest(candidate) === sourceDigest;
  };

  for (let n = 0; ; n++) {
    const candidate = candidatePath(dst, n, infix);
    const existing = statSync(candidate, { throwIfNoEntry: false });

    if (existing) {
      if (existing.isFile() && sameContent(candidate, existing.size)) {
        return { path: candidate, status: 'identical' };
      }
      continue;
    }

    try {
      copyFileSync(src, candidate, constants.COPYFILE_EXCL);
      utimesSync(candidate, sourceStats.atime, sourceStats.mtime);
    } catch (error) {
      // A partial copy would later pass for a distinct file
      if (!isAlreadyExists(error)) {
        rmSync(candidate, { force: true });
      }
      throw new FileIOError(`Copy ${src} -> ${candidate} failed: ${errorMessage(error)}`, candidate, error);
    }
    return { path: candidate, status: 'copied' };
  }
}
