/**
 * Coverage scanner.
 *
 * Walks a project tree, classifies every file by its header and hands the
 * records to `buildReport`. Files are read with bounded concurrency; a file
 * that cannot be read is recorded in `ioFailures` and the scan goes on.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import type { Logger } from 'pino';
import type {
  Classification,
  DialectTable,
  FileRecord,
  FileTypeDialect,
  IoFailure,
  ParseResult,
  ProjectReport,
} from './types.js';
import { buildReport } from './aggregate.js';
import { defaultDialectTable, resolveDialect } from './dialects.js';
import { DEFAULT_EXCLUDE, createExcludeMatcher, type ExcludeMatcher } from './exclude.js';
import { ScanRootError } from './errors.js';
import { estimateAiLines } from './estimate.js';
import { silentLogger } from './logger.js';
import { parseHeader } from './parse.js';

export const DEFAULT_SCAN_CONCURRENCY = 16;

export interface ScanOptions {
  /** Extra excluded path segments, added to DEFAULT_EXCLUDE */
  exclude?: readonly string[];
  /** Files never listed, such as the reports this scan is about to overwrite */
  skipFiles?: readonly string[];
  dialects?: DialectTable;
  /** Files read in parallel (default 16) */
  concurrency?: number;
  logger?: Logger;
  /** Clock for `generatedAt` */
  now?: () => Date;
}

/**
 * Scan `root` and build the project report.
 *
 * @throws ScanRootError if `root` is missing or not a directory.
 */
export async function scanProject(root: string, options: ScanOptions = {}): Promise<ProjectReport> {
  const logger = (options.logger ?? silentLogger()).child({ component: 'scanner' });
  const absRoot = path.resolve(root);

  let rootIsDirectory: boolean;
  try {
    rootIsDirectory = (await stat(absRoot)).isDirectory();
  } catch (err) {
    throw new ScanRootError(absRoot, `Cannot read scan root ${absRoot}: ${errorMessage(err)}`);
  }
  if (!rootIsDirectory) {
    throw new ScanRootError(absRoot, `Scan root is not a directory: ${absRoot}`);
  }

  const matchesExclude = createExcludeMatcher([...DEFAULT_EXCLUDE, ...(options.exclude ?? [])]);
  const skipped = new Set((options.skipFiles ?? []).map((p) => path.resolve(p)));
  const isExcluded: ExcludeMatcher = (relPath) =>
    matchesExclude(relPath) || skipped.has(path.join(absRoot, relPath));
  const dialects = options.dialects ?? defaultDialectTable();
  const ioFailures: IoFailure[] = [];

  const paths = await listFiles(absRoot, '', isExcluded, ioFailures, logger);
  logger.debug({ root: absRoot, files: paths.length }, 'Collected files');

  const records = await mapWithConcurrency(
    paths,
    options.concurrency ?? DEFAULT_SCAN_CONCURRENCY,
    async (relPath): Promise<FileRecord | null> => {
      try {
        return await scanFile(absRoot, relPath, dialects);
      } catch (err) {
        logger.warn({ path: relPath, err }, 'Failed to read file');
        ioFailures.push({ path: relPath, message: errorMessage(err) });
        return null;
      }
    },
  );

  const report = buildReport({
    root: absRoot,
    generatedAt: (options.now ?? (() => new Date()))().toISOString(),
    records: records.filter((r): r is FileRecord => r !== null),
    ioFailures,
  });

  logger.info(
    { root: absRoot, files: report.files.length, ioFailures: report.ioFailures.length },
    'Scan complete',
  );
  return report;
}

/**
 * Classify one file from its text. Pure; the scanner's per-file step after
 * reading.
 */
export function classifyText(
  relPath: string,
  text: string,
  bytes: number,
  dialect: FileTypeDialect,
): FileRecord {
  const parsed = parseHeader(text, dialect);
  const lines = countLines(text);
  const header = parsed.status === 'header' ? parsed.header : null;

  return {
    path: relPath,
    directory: topLevelDirectory(relPath),
    language: dialect.language,
    classification: classify(parsed),
    header,
    malformedReason: parsed.status === 'malformed' ? parsed.reason : null,
    malformedMessage: parsed.status === 'malformed' ? parsed.message : null,
    diagnostics: parsed.status === 'no-header' ? [] : parsed.diagnostics,
    bytes,
    lines,
    aiLines: header ? estimateAiLines(header, lines) : 0,
  };
}

/** Lines in `text`; a final line without terminator still counts */
export function countLines(text: string): number {
  if (text === '') return 0;
  let count = 0;
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    count++;
  }
  return text.endsWith('\n') ? count : count + 1;
}

function classify(parsed: ParseResult): Classification {
  switch (parsed.status) {
    case 'no-header':
      return 'NoAigcapHeader';
    case 'malformed':
      return 'Malformed';
    case 'header':
      return parsed.header.reviewedByHuman ? 'Reviewed' : 'Unreviewed';
  }
}

function topLevelDirectory(relPath: string): string {
  const slash = relPath.indexOf('/');
  return slash === -1 ? '.' : relPath.slice(0, slash);
}

async function scanFile(root: string, relPath: string, dialects: DialectTable): Promise<FileRecord> {
  const fullPath = path.join(root, relPath);
  const dialect = resolveDialect(relPath, dialects);

  if (!dialect) {
    const info = await stat(fullPath);
    return {
      path: relPath,
      directory: topLevelDirectory(relPath),
      language: null,
      classification: 'Unsupported',
      header: null,
      malformedReason: null,
      malformedMessage: null,
      diagnostics: [],
      bytes: info.size,
      lines: 0,
      aiLines: 0,
    };
  }

  const buffer = await readFile(fullPath);
  return classifyText(relPath, buffer.toString('utf-8'), buffer.length, dialect);
}

/**
 * Recursively list regular files under `dir`, as posix paths relative to the
 * scan root, skipping excluded directories without descending into them.
 */
async function listFiles(
  root: string,
  relDir: string,
  isExcluded: ExcludeMatcher,
  ioFailures: IoFailure[],
  logger: Logger,
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(path.join(root, relDir), { withFileTypes: true });
  } catch (err) {
    // The root itself was checked by the caller; this is a nested directory
    logger.warn({ path: relDir, err }, 'Failed to read directory');
    ioFailures.push({ path: relDir, message: errorMessage(err) });
    return [];
  }

  const files: string[] = [];
  for (const entry of entries) {
    const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
    if (isExcluded(relPath)) continue;

    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, relPath, isExcluded, ioFailures, logger)));
    } else if (entry.isFile()) {
      files.push(relPath);
    }
  }

  return files.sort();
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight. Results keep
 * the input order.
 */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  const processNext = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item);
    }
  };

  const inflight: Promise<void>[] = [];
  const concurrency = Math.max(1, Math.min(limit, items.length));
  for (let i = 0; i < concurrency; i++) {
    inflight.push(processNext());
  }
  await Promise.all(inflight);

  return results;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
