import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from './config.js';
import {
  backupNameFor,
  classifyDocument,
  contentCodeOf,
  extractedPageNumber,
  isBackupName,
  makeFolderName,
  sourceCodeOf,
  sourceContentCode,
} from './naming.js';

const naming = DEFAULT_CONFIG.naming;

describe('makeFolderName', () => {
  it('should join trimmed keys with an underscore', () => {
    expect(makeFolderName(' L1 ', 'S1  ')).toBe('L1_S1');
  });
});

describe('classifyDocument', () => {
  it('should read roles from names', () => {
    expect(classifyDocument('Combined.pdf', naming)).toBe('merged-output');
    expect(classifyDocument('combined.PDF', naming)).toBe('merged-output');
    expect(classifyDocument('12.pdf', naming)).toBe('extracted-range');
    expect(classifyDocument('12_FRI.pdf', naming)).toBe('backup-copy');
    expect(classifyDocument('Line (A-1-1)_fri.pdf', naming)).toBe('backup-copy');
    expect(classifyDocument('Line (A-1-1).pdf', naming)).toBe('source-original');
    expect(classifyDocument('notes.pdf', naming)).toBe('source-original');
  });

  it('should ignore files that are not PDFs', () => {
    expect(classifyDocument('output.xlsx', naming)).toBeUndefined();
    expect(classifyDocument('.merge-cache.json', naming)).toBeUndefined();
  });
});

describe('backup names', () => {
  it('should append the suffix before the extension', () => {
    expect(backupNameFor('Line (A-1-1).pdf', naming)).toBe('Line (A-1-1)_FRI.pdf');
    expect(isBackupName('3_FRI.pdf', naming)).toBe(true);
    expect(isBackupName('FRI.pdf', naming)).toBe(false);
  });
});

describe('codes', () => {
  it('should read the raw code in trailing parentheses', () => {
    expect(sourceCodeOf('P&ID (A-1-1).pdf')).toBe('A-1-1');
    expect(sourceCodeOf('(A-1-1) draft.pdf')).toBeUndefined();
  });

  it('should keep the first two segments as the content code', () => {
    expect(contentCodeOf('x (A-1-1).pdf')).toBe('A-1');
    expect(contentCodeOf('x (B-22).pdf')).toBe('B-22');
    expect(contentCodeOf('x (C).pdf')).toBeUndefined();
  });

  it('should only give codes for source originals', () => {
    expect(sourceContentCode('x (A-1-1).pdf', naming)).toBe('A-1');
    expect(sourceContentCode('x (A-1-1)_FRI.pdf', naming)).toBeUndefined();
  });

  it('should parse extracted page numbers', () => {
    expect(extractedPageNumber('007.pdf')).toBe(7);
    expect(extractedPageNumber('7a.pdf')).toBeUndefined();
  });
});
