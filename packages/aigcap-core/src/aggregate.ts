/**
 * Report aggregation and the CI gate.
 *
 * `buildReport` is pure: the same records give the same report regardless of
 * the order they were scanned in.
 */

import type {
  Classification,
  ClassificationBucket,
  CoverageType,
  DirectoryStats,
  FileRecord,
  IoFailure,
  LanguageStats,
  ProjectReport,
} from './types.js';

export const CLASSIFICATIONS = [
  'NoAigcapHeader',
  'Unreviewed',
  'Reviewed',
  'Malformed',
  'Unsupported',
] as const satisfies readonly Classification[];

export interface ReportInput {
  root: string;
  generatedAt: string;
  records: readonly FileRecord[];
  ioFailures: readonly IoFailure[];
}

export interface CiDecision {
  status: 'pass' | 'fail';
  unreviewedFiles: string[];
}

const byPath = (a: { path: string }, b: { path: string }): number =>
  a.path < b.path ? -1 : a.path > b.path ? 1 : 0;

function zeroCounts(): Record<Classification, number> {
  return { NoAigcapHeader: 0, Unreviewed: 0, Reviewed: 0, Malformed: 0, Unsupported: 0 };
}

function emptyBucket(): ClassificationBucket {
  return { files: 0, bytes: 0, lines: 0, paths: [] };
}

/**
 * Aggregate file records into a ProjectReport.
 */
export function buildReport(input: ReportInput): ProjectReport {
  const files = [...input.records].sort(byPath);

  const totals = zeroCounts();
  const overall = { files: 0, bytes: 0, lines: 0, aiLines: 0 };
  const byClassification: Record<Classification, ClassificationBucket> = {
    NoAigcapHeader: emptyBucket(),
    Unreviewed: emptyBucket(),
    Reviewed: emptyBucket(),
    Malformed: emptyBucket(),
    Unsupported: emptyBucket(),
  };
  const byCoverageType: Record<CoverageType, number> = { WHOLE: 0, ABOVE_HALF: 0, BELOW_HALF: 0 };
  const byReview = { reviewed: 0, unreviewed: 0 };
  const directories = new Map<string, DirectoryStats>();
  const languages = new Map<string, LanguageStats>();

  for (const file of files) {
    totals[file.classification]++;

    overall.files++;
    overall.bytes += file.bytes;
    overall.lines += file.lines;
    overall.aiLines += file.aiLines;

    const bucket = byClassification[file.classification];
    bucket.files++;
    bucket.bytes += file.bytes;
    bucket.lines += file.lines;
    bucket.paths.push(file.path);

    if (file.header) {
      byCoverageType[file.header.coverageType]++;
      if (file.header.reviewedByHuman) byReview.reviewed++;
      else byReview.unreviewed++;
    }

    let dir = directories.get(file.directory);
    if (!dir) {
      dir = { directory: file.directory, files: 0, bytes: 0, lines: 0, aiLines: 0, counts: zeroCounts() };
      directories.set(file.directory, dir);
    }
    dir.files++;
    dir.bytes += file.bytes;
    dir.lines += file.lines;
    dir.aiLines += file.aiLines;
    dir.counts[file.classification]++;

    if (file.language) {
      let lang = languages.get(file.language);
      if (!lang) {
        lang = { language: file.language, files: 0, bytes: 0, lines: 0, aiLines: 0 };
        languages.set(file.language, lang);
      }
      lang.files++;
      lang.bytes += file.bytes;
      lang.lines += file.lines;
      lang.aiLines += file.aiLines;
    }
  }

  return {
    root: input.root,
    generatedAt: input.generatedAt,
    totals,
    overall,
    byClassification,
    byDirectory: [...directories.values()].sort((a, b) => compare(a.directory, b.directory)),
    byCoverageType,
    byReview,
    byLanguage: [...languages.values()].sort(
      (a, b) => b.lines - a.lines || compare(a.language, b.language),
    ),
    unreviewedFiles: [...byClassification.Unreviewed.paths],
    files,
    ioFailures: [...input.ioFailures].sort(byPath),
  };
}

/**
 * CI gate: fail while any file still carries `REVIEWED-BY-HUMAN: NO`.
 */
export function ciDecision(report: ProjectReport): CiDecision {
  return {
    status: report.unreviewedFiles.length === 0 ? 'pass' : 'fail',
    unreviewedFiles: [...report.unreviewedFiles],
  };
}

/** Share of `part` in `total` as a percentage with one decimal; 0 when empty */
export function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
