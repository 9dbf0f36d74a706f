/**
 * Per-folder merge cache.
 *
 * A hidden sidecar in each folder records the fingerprint of the candidate
 * files behind the last merged output that was written and verified.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { errorMessage, type Logger } from './logger.js';
import { FileIOError } from './errors.js';

export interface MergeCacheEntry {
  folder: string;
  fingerprint: string;
  timestamp: Date;
}

function parseEntry(raw: unknown): MergeCacheEntry | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const folder: unknown = Reflect.get(raw, 'folder');
  const fingerprint: unknown = Reflect.get(raw, 'fingerprint');
  const timestamp: unknown = Reflect.get(raw, 'timestamp');

  if (typeof fingerprint !== 'string' || !/^[0-9a-f]{64}$/.test(fingerprint)) return null;
  if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) return null;

  return {
    folder: typeof folder === 'string' ? folder : '',
    fingerprint,
    timestamp: new Date(timestamp),
  };
}

export class MergeCache {
  private sidecarPath: string;
  private folder: string;
  private logger?: Logger;

  constructor(folderPath: string, sidecarName: string = '.merge-cache.json', logger?: Logger) {
    this.folder = basename(folderPath);
    this.sidecarPath = join(folderPath, sidecarName);
    this.logger = logger;
  }

  /**
   * Stored entry, or null when absent or unreadable
   */
  load(): MergeCacheEntry | null {
    if (!existsSync(this.sidecarPath)) return null;

    try {
      const entry = parseEntry(JSON.parse(readFileSync(this.sidecarPath, 'utf-8')));
      if (!entry) {
        this.logger?.warn(`Ignoring malformed merge cache in ${this.folder}`);
      }
      return entry;
    } catch (error) {
      this.logger?.warn(`Ignoring unreadable merge cache in ${this.folder}: ${errorMessage(error)}`);
      return null;
    }
  }

  isFresh(fingerprint: string): boolean {
    return this.load()?.fingerprint === fingerprint;
  }

  /**
   * Persist the fingerprint of a merged output that has just been written
   */
  record(fingerprint: string, timestamp: Date = new Date()): MergeCacheEntry {
    const entry: MergeCacheEntry = { folder: this.folder, fingerprint, timestamp };
    const temporary = `${this.sidecarPath}.partial`;

    try {
      writeFileSync(
        temporary,
        JSON.stringify({ folder: entry.folder, fingerprint, timestamp: timestamp.toISOString() }, null, 2) + '\n'
      );
      renameSync(temporary, this.sidecarPath);
    } catch (error) {
      throw new FileIOError(`Cannot write merge cache for ${this.folder}: ${errorMessage(error)}`, this.sidecarPath, error);
    }

    this.logger?.debug(`Merge cache updated`, { folder: this.folder, fingerprint: fingerprint.slice(0, 12) });
    return entry;
  }

  getPath(): string {
    return this.sidecarPath;
  }
}
