import { describe, it, expect, beforeEach } from 'vitest';
import { existsSync, readFileSync, statSync, utimesSync, writeFileSync } from 'fs';
import { join } from 'path';
import { candidatePath, safeCopy } from './safe-copy.js';
import { FileIOError, LookupError } from './errors.js';
import { makeTempDir } from '../tests/helpers/fixtures.js';

describe('candidatePath', () => {
  it('should number candidates before the extension', () => {
    expect(candidatePath('/x/doc.pdf', 0)).toBe('/x/doc.pdf');
    expect(candidatePath('/x/doc.pdf', 2)).toBe('/x/doc_dup2.pdf');
    expect(candidatePath('/x/doc.pdf', 1, '~')).toBe('/x/doc~1.pdf');
  });
});

describe('safeCopy', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('safe-copy');
  });

  it('should copy into a missing destination and keep modification times', () => {
    const src = join(dir, 'a.pdf');
    writeFileSync(src, 'alpha');
    const past = new Date('2020-01-01T00:00:00Z');
    utimesSync(src, past, past);

    const result = safeCopy(src, join(dir, 'out', 'a.pdf'));

    expect(result).toEqual({ path: join(dir, 'out', 'a.pdf'), status: 'copied' });
    expect(readFileSync(result.path, 'utf-8')).toBe('alpha');
    expect(statSync(result.path).mtimeMs).toBe(past.getTime());
  });

  it('should report an existing file of the same size as identical', () => {
    const src = join(dir, 'a.pdf');
    const dst = join(dir, 'b.pdf');
    writeFileSync(src, 'alpha');
    writeFileSync(dst, 'omega');

    expect(safeCopy(src, dst)).toEqual({ path: dst, status: 'identical' });
    expect(readFileSync(dst, 'utf-8')).toBe('omega');
  });

  it('should compare digests under content identity', () => {
    const src = join(dir, 'a.pdf');
    const dst = join(dir, 'b.pdf');
    writeFileSync(src, 'alpha');
    writeFileSync(dst, 'omega');

    const result = safeCopy(src, dst, { identity: 'content' });

    expect(result).toEqual({ path: join(dir, 'b_dup1.pdf'), status: 'copied' });
    expect(readFileSync(dst, 'utf-8')).toBe('omega');
  });

  it('should never overwrite distinct files with the same name', () => {
    const dst = join(dir, 'target', 'doc.pdf');
    const sources = ['one', 'three', 'fifteen'].map((text, index) => {
      const path = join(dir, `src${index}.pdf`);
      writeFileSync(path, text);
      return path;
    });

    const paths = sources.map(src => safeCopy(src, dst).path);

    expect(paths).toEqual([dst, join(dir, 'target', 'doc_dup1.pdf'), join(dir, 'target', 'doc_dup2.pdf')]);
    expect(paths.map(path => readFileSync(path, 'utf-8'))).toEqual(['one', 'three', 'fifteen']);
  });

  it('should return the matching duplicate instead of copying again', () => {
    const dst = join(dir, 'doc.pdf');
    writeFileSync(dst, 'x');
    const src = join(dir, 'src.pdf');
    writeFileSync(src, 'longer');

    const first = safeCopy(src, dst);
    const second = safeCopy(src, dst);

    expect(first).toEqual({ path: join(dir, 'doc_dup1.pdf'), status: 'copied' });
    expect(second).toEqual({ path: join(dir, 'doc_dup1.pdf'), status: 'identical' });
    expect(existsSync(join(dir, 'doc_dup2.pdf'))).toBe(false);
  });

  it('should throw LookupError for a missing source', () => {
    let thrown: unknown;
    try {
      safeCopy(join(dir, 'nope.pdf'), join(dir, 'x.pdf'));
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(LookupError);
    expect(thrown).toMatchObject({ code: 'SOURCE_NOT_FOUND' });
    expect(existsSync(join(dir, 'x.pdf'))).toBe(false);
  });

  it('should wrap write failures in FileIOError', () => {
    const src = join(dir, 'a.pdf');
    writeFileSync(src, 'alpha');
    // A file where the parent folder should be
    writeFileSync(join(dir, 'blocked'), '');

    expect(() => safeCopy(src, join(dir, 'blocked', 'a.pdf'))).toThrow(FileIOError);
  });
});
