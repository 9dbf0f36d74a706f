/**
 * Page-level deduplication for one folder's merge pass
 */

import type { PDFDocument } from 'pdf-lib';
import type { NamingConfig } from './config.js';
import { pageFingerprint } from './content-hasher.js';
import { toUnitError } from './errors.js';
import { createPdf, loadPdf } from './pdf-documents.js';
import { classifyDocument, extractedPageNumber, type DocumentRole } from './naming.js';

export interface MergeCandidate {
  name: string;
  path: string;
  role: Exclude<DocumentRole, 'merged-output'>;
}

export interface SourceOutcome {
  name: string;
  pagesKept: number;
  pagesSkipped: number;
  error?: Error;
}

export interface DedupResult {
  document: PDFDocument;
  pagesKept: number;
  pagesSkipped: number;
  sources: SourceOutcome[];
}

export interface DedupOptions {
  skipDuplicatePages?: boolean;
}

const ROLE_PRECEDENCE: Record<MergeCandidate['role'], number> = {
  'extracted-range': 0,
  'source-original': 1,
  'backup-copy': 2,
};

function compareNames(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareCandidates(a: MergeCandidate, b: MergeCandidate): number {
  const byRole = ROLE_PRECEDENCE[a.role] - ROLE_PRECEDENCE[b.role];
  if (byRole !== 0) return byRole;

  if (a.role === 'extracted-range') {
    const byPage = (extractedPageNumber(a.name) ?? 0) - (extractedPageNumber(b.name) ?? 0);
    if (byPage !== 0) return byPage;
  }
  return compareNames(a.name, b.name);
}

/**
 * Merge candidates in precedence order: extracted pages by number, then
 * source originals, then backup copies, each by name. The order decides
 * which copy of a repeated page is kept and the page order of the output.
 */
export function orderCandidates(
  files: ReadonlyArray<{ name: string; path: string }>,
  naming: NamingConfig
): MergeCandidate[] {
  const candidates: MergeCandidate[] = [];
  for (const file of files) {
    const role = classifyDocument(file.name, naming);
    if (role === undefined || role === 'merged-output') continue;
    candidates.push({ name: file.name, path: file.path, role });
  }
  return candidates.sort(compareCandidates);
}

/**
 * Build the merged document. A page is kept the first time its fingerprint
 * is seen in this pass. Candidates that cannot be read, fingerprinted or
 * copied are reported in `sources` and contribute nothing.
 */
export async function buildMergedDocument(
  candidates: readonly MergeCandidate[],
  options: DedupOptions = {}
): Promise<DedupResult> {
  const skipDuplicates = options.skipDuplicatePages ?? true;
  const output = await createPdf();
  const seen = new Set<string>();
  const sources: SourceOutcome[] = [];
  let pagesKept = 0;
  let pagesSkipped = 0;

  for (const candidate of candidates) {
    try {
      const source = await loadPdf(candidate.path);

      // Fingerprints join `seen` only once the pages are in the output
      const keep: number[] = [];
      const fresh = new Set<string>();
      let skipped = 0;
      source.getPages().forEach((page, index) => {
        if (skipDuplicates) {
          const fingerprint = pageFingerprint(page);
          if (seen.has(fingerprint) || fresh.has(fingerprint)) {
            skipped++;
            return;
          }
          fresh.add(fingerprint);
        }
        keep.push(index);
      });

      const copied = keep.length > 0 ? await output.copyPages(source, keep) : [];
      for (const page of copied) {
        output.addPage(page);
      }
      for (const fingerprint of fresh) {
        seen.add(fingerprint);
      }

      pagesKept += keep.length;
      pagesSkipped += skipped;
      sources.push({ name: candidate.name, pagesKept: keep.length, pagesSkipped: skipped });
    } catch (error) {
      sources.push({ name: candidate.name, pagesKept: 0, pagesSkipped: 0, error: toUnitError(error, candidate.path) });
    }
  }

  return { document: output, pagesKept, pagesSkipped, sources };
}
