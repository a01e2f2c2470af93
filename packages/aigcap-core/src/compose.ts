/**
 * AIGCAP v1 Compose
 *
 * Renders a HeaderModel into the comment block written at the top of a file.
 * Output is canonical: fixed section order, empty sections omitted, one entry
 * per line.
 */

import type {
  CommentStyle,
  FileTypeDialect,
  HeaderModel,
  LibraryEntry,
  SymbolEntry,
  SymbolSectionKey,
} from './types.js';
import {
  BANNER,
  COVERAGE_TYPE_LABELS,
  ENTRY_BULLET,
  REVIEW_FIELD,
  RULE,
  SECTION_ORDER,
  SECTION_TITLES,
  SYMBOL_KINDS,
  TYPE_FIELD,
} from './constants.js';
import { HeaderFormatError } from './errors.js';
import { validateHeader } from './validate.js';

/**
 * Serialize a header for `dialect`, every line terminated by `eol`.
 *
 * @throws HeaderFormatError if the header fails validation for this dialect.
 */
export function serializeHeader(
  header: HeaderModel,
  dialect: FileTypeDialect,
  eol: '\n' | '\r\n' = '\n',
): string {
  const validation = validateHeader(header, dialect);
  if (!validation.valid) {
    const details = validation.errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    throw new HeaderFormatError(`Invalid header: ${details}`, validation.errors);
  }

  return wrapInComment(composeHeaderLines(header), dialect.style)
    .map((line) => line + eol)
    .join('');
}

/**
 * The header's content lines, before comment syntax is applied.
 */
export function composeHeaderLines(header: HeaderModel): string[] {
  const lines = [
    RULE,
    BANNER,
    RULE,
    `${TYPE_FIELD}: ${COVERAGE_TYPE_LABELS[header.coverageType]}`,
    `${REVIEW_FIELD}: ${header.reviewedByHuman ? 'YES' : 'NO'}`,
  ];

  for (const key of SECTION_ORDER) {
    const entries =
      key === 'libraries'
        ? header.libraries.map(formatLibraryEntry)
        : header[key].map((entry) => formatSymbolEntry(key, entry));

    if (entries.length === 0) continue;

    lines.push('', SECTION_TITLES[key]);
    for (const entry of entries) {
      lines.push(ENTRY_BULLET + entry);
    }
  }

  lines.push(RULE);
  return lines;
}

export function formatSymbolEntry(section: SymbolSectionKey, entry: SymbolEntry): string {
  const kind = SYMBOL_KINDS[section];
  if (entry.extent.kind === 'whole') {
    return `WHOLE CODE IN THE ${kind} ${entry.name}`;
  }
  return `${entry.extent.start}~${entry.extent.end} LINE CODE IN THE ${kind} ${entry.name}`;
}

export function formatLibraryEntry(entry: LibraryEntry): string {
  return `${entry.name}: ${entry.reason}`;
}

function wrapInComment(lines: string[], style: CommentStyle): string[] {
  if (style.kind === 'line') {
    return lines.map((line) => (line === '' ? style.prefix : `${style.prefix} ${line}`));
  }

  if (!style.decoration) {
    return [style.open, ...lines, style.close];
  }

  const mark = ` ${style.decoration}`;
  return [
    style.open,
    ...lines.map((line) => (line === '' ? mark : `${mark} ${line}`)),
    ` ${style.close}`,
  ];
}
