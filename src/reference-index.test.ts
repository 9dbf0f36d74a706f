import { describe, it, expect } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { TextReferenceIndex, loadReferenceIndex } from './reference-index.js';
import { FileIOError } from './errors.js';
import { makeTempDir } from '../tests/helpers/fixtures.js';

const CONTENT = [
  'Line-(A-1-1).pdf 4',
  'line-(a-1-2).pdf 2',
  'LINE-(A-1-2).pdf 4',
  'other-(B-2-1).pdf 7',
  'broken-(A-1-9).pdf page',
  'lonely',
  '',
].join('\n');

describe('TextReferenceIndex', () => {
  it('should union the pages of every key containing the code', () => {
    const index = TextReferenceIndex.parse(CONTENT);
    expect(index.pagesFor('A-1')).toEqual([2, 4]);
    expect(index.pagesFor('b-2')).toEqual([7]);
    expect(index.pagesFor('Z-9')).toEqual([]);
  });

  it('should lower-case keys and skip non-numeric pages', () => {
    const index = TextReferenceIndex.parse(CONTENT);
    expect(index.size).toBe(3);
    expect(index.pagesFor('a-1-9')).toEqual([]);
  });
});

describe('loadReferenceIndex', () => {
  it('should read the index from a file with CRLF line endings', () => {
    const path = join(makeTempDir('reference-index'), 'index.txt');
    writeFileSync(path, 'x-(A-1-1).pdf 3\r\nx-(A-1-1).pdf 1\r\n');
    expect(loadReferenceIndex(path).pagesFor('A-1')).toEqual([1, 3]);
  });

  it('should throw FileIOError for a missing file', () => {
    expect(() => loadReferenceIndex(join(makeTempDir('reference-index'), 'none.txt'))).toThrow(FileIOError);
  });
});
