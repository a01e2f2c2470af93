/**
 * AIGCAP v1 TypeScript Types
 *
 * Header model, parse results and the comment dialect description.
 */

import type { COVERAGE_TYPES, SECTION_ORDER } from './constants.js';

/** How much of a file the agent claims to have written */
export type CoverageType = (typeof COVERAGE_TYPES)[number];

/** One of the four detail sections */
export type SectionKey = (typeof SECTION_ORDER)[number];

/** Detail sections that list symbols (everything except libraries) */
export type SymbolSectionKey = Exclude<SectionKey, 'libraries'>;

/** Extent of AI-written code inside a symbol */
export type SymbolExtent =
  | { kind: 'whole' }
  | {
      kind: 'lines';
      /** 1-based, relative to the symbol's own body */
      start: number;
      end: number;
    };

export interface SymbolEntry {
  name: string;
  extent: SymbolExtent;
}

/** A dependency the agent chose on its own */
export interface LibraryEntry {
  name: string;
  /** Why the agent picked it */
  reason: string;
}

/**
 * The structured header of one file.
 */
export interface HeaderModel {
  coverageType: CoverageType;

  /** Flipped to true by a human, never by the agent */
  reviewedByHuman: boolean;

  methods: SymbolEntry[];
  structs: SymbolEntry[];
  traits: SymbolEntry[];
  libraries: LibraryEntry[];
}

// ---------------------------------------------------------------------------
// Comment dialects
// ---------------------------------------------------------------------------

/** Delimited comment (`/* ... *\/`, `<!-- ... -->`, `(* ... *)`) */
export interface BlockCommentStyle {
  kind: 'block';
  open: string;
  close: string;
  /** Per-line decoration inside the block (` *`), empty when none */
  decoration: string;
}

/** Line comment repeated on every line (`#`, `--`, `//`) */
export interface LineCommentStyle {
  kind: 'line';
  prefix: string;
}

export type CommentStyle = BlockCommentStyle | LineCommentStyle;

export type CommentStyleName =
  | 'c-block'
  | 'ml-block'
  | 'html'
  | 'hash'
  | 'dash'
  | 'slash'
  | 'percent'
  | 'semicolon';

/** Comment convention for one file extension */
export interface FileTypeDialect {
  /** Lower-cased, with leading dot */
  extension: string;
  language: string;
  styleName: CommentStyleName;
  style: CommentStyle;
}

/** Extension -> dialect lookup */
export type DialectTable = ReadonlyMap<string, FileTypeDialect>;

// ---------------------------------------------------------------------------
// Parse results
// ---------------------------------------------------------------------------

/** Non-fatal finding recorded while parsing (dropped entry, stray line) */
export interface Diagnostic {
  severity: 'warning';
  /** 1-based line number in the file */
  line: number;
  message: string;
}

export type MalformedReason =
  | 'missing-banner'
  | 'missing-type'
  | 'invalid-type'
  | 'missing-review-flag'
  | 'invalid-review-flag'
  | 'unterminated';

/** Character range of the leading header block */
export interface HeaderSpan {
  /** Offset right after the preamble (leading blank lines belong to the span) */
  start: number;
  /** Offset after the block's last line terminator */
  end: number;
  /** 1-based line of the comment opener */
  line: number;
  /** False when a block comment is never closed */
  terminated: boolean;
}

interface ParseResultBase {
  /** Length of the BOM / shebang / XML declaration kept ahead of the header */
  preambleEnd: number;
}

export interface NoHeaderResult extends ParseResultBase {
  status: 'no-header';
}

export interface HeaderResult extends ParseResultBase {
  status: 'header';
  header: HeaderModel;
  diagnostics: Diagnostic[];
  span: HeaderSpan;
}

export interface MalformedResult extends ParseResultBase {
  status: 'malformed';
  reason: MalformedReason;
  /** Human-readable form of `reason` */
  message: string;
  diagnostics: Diagnostic[];
  span: HeaderSpan;
}

/** Result of parsing a file's leading header */
export type ParseResult = NoHeaderResult | HeaderResult | MalformedResult;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface ValidationError {
  /** Path of the offending field (`methods[0].name`), or `sections` */
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

// ---------------------------------------------------------------------------
// Project scan
// ---------------------------------------------------------------------------

/** How the scanner files a path */
export type Classification =
  | 'NoAigcapHeader'
  | 'Unreviewed'
  | 'Reviewed'
  | 'Malformed'
  | 'Unsupported';

/** One scanned file; built fresh on every scan */
export interface FileRecord {
  /** Posix path relative to the scan root */
  path: string;
  /** First path segment, or `.` for files at the root */
  directory: string;
  /** Dialect language; null for unsupported files */
  language: string | null;
  classification: Classification;
  header: HeaderModel | null;
  malformedReason: MalformedReason | null;
  /** Parse message of a malformed header */
  malformedMessage: string | null;
  diagnostics: Diagnostic[];
  bytes: number;
  /** 0 for unsupported files (not read) */
  lines: number;
  aiLines: number;
}

/** A file or directory the scanner could not read */
export interface IoFailure {
  path: string;
  message: string;
}

export interface Tally {
  files: number;
  bytes: number;
  lines: number;
  aiLines: number;
}

export interface ClassificationBucket {
  files: number;
  bytes: number;
  lines: number;
  /** Sorted */
  paths: string[];
}

export interface DirectoryStats extends Tally {
  directory: string;
  counts: Record<Classification, number>;
}

export interface LanguageStats extends Tally {
  language: string;
}

export interface ProjectReport {
  /** Absolute scan root */
  root: string;
  /** ISO 8601 */
  generatedAt: string;
  totals: Record<Classification, number>;
  overall: Tally;
  byClassification: Record<Classification, ClassificationBucket>;
  byDirectory: DirectoryStats[];
  byCoverageType: Record<CoverageType, number>;
  byReview: { reviewed: number; unreviewed: number };
  byLanguage: LanguageStats[];
  unreviewedFiles: string[];
  files: FileRecord[];
  ioFailures: IoFailure[];
}
