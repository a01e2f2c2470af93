/**
 * @aigcap/core - AIGCAP v1 header library
 *
 * Parse, compose and enforce the AI-generated code header at the top of
 * source files, and scan a project into a coverage report.
 *
 * @example
 * ```ts
 * import { parseHeader, resolveDialect, upsertHeader } from '@aigcap/core';
 *
 * const dialect = resolveDialect('src/app.ts');
 * if (dialect) {
 *   const result = parseHeader(text, dialect);
 *   if (result.status === 'header' && !result.header.reviewedByHuman) {
 *     const reviewed = upsertHeader(text, { ...result.header, reviewedByHuman: true }, dialect);
 *   }
 * }
 * ```
 */

// Types
export type {
  CoverageType,
  SectionKey,
  SymbolSectionKey,
  SymbolExtent,
  SymbolEntry,
  LibraryEntry,
  HeaderModel,
  BlockCommentStyle,
  LineCommentStyle,
  CommentStyle,
  CommentStyleName,
  FileTypeDialect,
  DialectTable,
  Diagnostic,
  MalformedReason,
  HeaderSpan,
  NoHeaderResult,
  HeaderResult,
  MalformedResult,
  ParseResult,
  ValidationError,
  ValidationResult,
  Classification,
  FileRecord,
  IoFailure,
  Tally,
  ClassificationBucket,
  DirectoryStats,
  LanguageStats,
  ProjectReport,
} from './types.js';
export type { DialectEntry } from './dialects.js';
export type {
  EnforcementState,
  EnforcementOptions,
  HookDecision,
  AllowDecision,
  BlockDecision,
  WarnDecision,
  BlockCode,
  WarnCode,
} from './enforcement.js';
export type { ScanOptions } from './scanner.js';
export type { ReportInput, CiDecision } from './aggregate.js';
export type { RenderedReport } from './render.js';
export type { ExcludeMatcher } from './exclude.js';
export type { LineEnding } from './upsert.js';

// Dialects
export {
  COMMENT_STYLES,
  commentStyleNameSchema,
  dialectEntrySchema,
  normalizeExtension,
  createDialectTable,
  defaultDialectTable,
  resolveDialect,
} from './dialects.js';

// Header
export { parseHeader, findPreambleEnd, stripCommentSyntax } from './parse.js';
export { serializeHeader, composeHeaderLines, formatSymbolEntry, formatLibraryEntry } from './compose.js';
export { upsertHeader, detectLineEnding } from './upsert.js';
export { validateHeader } from './validate.js';

// Enforcement
export { deriveState, preWrite, postEdit, formatDecision, EXEMPT_FILE_NAMES } from './enforcement.js';

// Scanning and reporting
export { DEFAULT_EXCLUDE, createExcludeMatcher, parseExcludeList } from './exclude.js';
export { estimateAiLines, WHOLE_SYMBOL_LINE_ESTIMATE } from './estimate.js';
export { scanProject, classifyText, countLines, DEFAULT_SCAN_CONCURRENCY } from './scanner.js';
export { buildReport, ciDecision, percentage, CLASSIFICATIONS } from './aggregate.js';
export { renderJson, renderReport } from './render.js';
export { renderHtml, escapeHtml } from './dashboard.js';

// Errors
export { HeaderFormatError, ScanRootError } from './errors.js';

// Logging
export { silentLogger } from './logger.js';

// Constants
export {
  BANNER,
  RULE,
  COVERAGE_TYPES,
  COVERAGE_TYPE_LABELS,
  SECTION_ORDER,
  SECTION_TITLES,
  DEFAULT_PROTOCOL_PATH,
} from './constants.js';
