/**
 * Content fingerprints.
 *
 * Page scope: SHA-256 over a page's decoded content streams, with every
 * resource name replaced by a digest of the resource it names, plus its
 * media box and rotation. Re-saving a file (new object numbers, new
 * compression, new metadata, new random font keys) keeps the fingerprint;
 * changing what is drawn does not.
 *
 * Folder scope: SHA-256 over the ordered candidate files' names and bytes.
 */

import { readFileSync } from 'fs';
import { createHash } from 'crypto';
import {
  PDFArray,
  PDFDict,
  PDFRawStream,
  PDFRef,
  PDFStream,
  decodePDFRawStream,
} from 'pdf-lib';
import type { PDFContext, PDFObject, PDFPage } from 'pdf-lib';
import { FileIOError } from './errors.js';
import { errorMessage } from './logger.js';

const MAX_DEPTH = 8;
const SKIPPED_KEYS = new Set(['/Parent']);
const STREAM_ENCODING_KEYS = new Set(['/Length', '/Filter', '/DecodeParms', '/DL']);
const NAME_TOKEN = /\/([^\s/[\]()<>{}%]+)/g;

export function digestText(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

function digestBytes(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

function streamBytes(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) {
    try {
      return decodePDFRawStream(stream).decode();
    } catch {
      // Image codecs (DCT, JPX, JBIG2) are hashed as stored
      return stream.getContents();
    }
  }
  return stream.getContents();
}

class Canonicalizer {
  private memo = new Map<string, string>();

  constructor(private context: PDFContext) {}

  of(object: PDFObject | undefined, depth: number = MAX_DEPTH): string {
    if (object === undefined) return 'null';

    if (object instanceof PDFRef) {
      const key = object.toString();
      const cached = this.memo.get(key);
      if (cached !== undefined) return cached;
      if (depth <= 0) return 'ref';
      const value = this.of(this.context.lookup(object), depth - 1);
      this.memo.set(key, value);
      return value;
    }

    if (object instanceof PDFStream) {
      return `stream${this.dict(object.dict, depth, STREAM_ENCODING_KEYS)}#${digestBytes(streamBytes(object))}`;
    }

    if (object instanceof PDFDict) {
      return this.dict(object, depth, SKIPPED_KEYS);
    }

    if (object instanceof PDFArray) {
      return `[${object.asArray().map(item => this.of(item, depth)).join(' ')}]`;
    }

    return object.toString();
  }

  private dict(dict: PDFDict, depth: number, skipped: ReadonlySet<string>): string {
    const entries = dict
      .entries()
      .map(([name, value]) => [name.asString(), value] as const)
      .filter(([name]) => !skipped.has(name) && !SKIPPED_KEYS.has(name))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `<<${entries.map(([name, value]) => `${name} ${this.of(value, depth)}`).join(' ')}>>`;
  }
}

/**
 * Resource name (without the slash) → digest of the named resource
 */
function resourceDigests(page: PDFPage, canonical: Canonicalizer): Map<string, string> {
  const digests = new Map<string, string>();
  const resources = page.node.Resources();
  if (!resources) return digests;

  for (const [, category] of resources.entries()) {
    const dict = page.doc.context.lookup(category);
    if (!(dict instanceof PDFDict)) continue;

    for (const [name, value] of dict.entries()) {
      const key = name.asString().slice(1);
      const digest = digestText(canonical.of(value)).slice(0, 16);
      const previous = digests.get(key);
      digests.set(key, previous ? `${previous}+${digest}` : digest);
    }
  }

  return digests;
}

function contentBytes(page: PDFPage): Buffer {
  const context = page.doc.context;
  const contents = page.node.Contents();
  const streams: PDFObject[] = contents instanceof PDFArray ? contents.asArray() : contents ? [contents] : [];

  const parts: Buffer[] = [];
  for (const item of streams) {
    const stream = item instanceof PDFRef ? context.lookup(item) : item;
    if (stream instanceof PDFStream) {
      parts.push(Buffer.from(streamBytes(stream)), Buffer.from('\n'));
    }
  }
  return Buffer.concat(parts);
}

export function pageFingerprint(page: PDFPage): string {
  const canonical = new Canonicalizer(page.doc.context);
  const names = resourceDigests(page, canonical);

  const content = contentBytes(page)
    .toString('latin1')
    .replace(NAME_TOKEN, (token: string, name: string) => {
      const digest = names.get(name);
      return digest ? `/@${digest}` : token;
    });

  return createHash('sha256')
    .update(`box:${canonical.of(page.node.MediaBox())}|rotate:${page.getRotation().angle}\n`)
    .update(content, 'latin1')
    .digest('hex');
}

export interface FingerprintInput {
  name: string;
  path: string;
}

/**
 * Digest of an ordered file set. `salt` carries settings that change what
 * would be produced from the same files.
 */
export function folderFingerprint(files: readonly FingerprintInput[], salt: string = ''): string {
  const hash = createHash('sha256');
  hash.update(`v1|${salt}\n`);

  for (const file of files) {
    let bytes: Buffer;
    try {
      bytes = readFileSync(file.path);
    } catch (error) {
      throw new FileIOError(`Cannot read ${file.path}: ${errorMessage(error)}`, file.path, error);
    }
    hash.update(`${file.name}\0${bytes.length}\0`);
    hash.update(bytes);
  }

  return hash.digest('hex');
}
