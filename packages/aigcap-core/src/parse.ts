/**
 * AIGCAP v1 Parse
 *
 * Extracts the structured header from the top of a file's text.
 * Returns a result type and never throws.
 *
 * Expected layout (shown in the C block dialect):
 *
 *   #!optional shebang / <?xml ...?> / <?php
 *   /*
 *    * ========================================
 *    * THIS FILE INCLUDES AI GENERATED CODE
 *    * ========================================
 *    * TYPE: ABOVE 50% IN THIS FILE
 *    * REVIEWED-BY-HUMAN: NO
 *    *
 *    * METHOD(FUNCTIONS):
 *    * - 3~18 LINE CODE IN THE METHOD parse
 *    * ========================================
 *    *\/
 */

import type {
  CommentStyle,
  CoverageType,
  Diagnostic,
  FileTypeDialect,
  HeaderModel,
  HeaderSpan,
  LibraryEntry,
  MalformedReason,
  ParseResult,
  SectionKey,
  SymbolEntry,
  SymbolSectionKey,
} from './types.js';
import {
  BANNER,
  BYTE_ORDER_MARK,
  COVERAGE_TYPES,
  COVERAGE_TYPE_PATTERNS,
  ENTRY_LINE_REGEX,
  LIBRARY_ENTRY_REGEX,
  PREAMBLE_LINE_PATTERNS,
  QUOTED_NAME_REGEX,
  REVIEW_LINE_REGEX,
  RULE_LINE_REGEX,
  SECTION_ORDER,
  SECTION_TITLES,
  SECTION_TITLE_PATTERNS,
  SYMBOL_KIND_ALIASES,
  TYPE_LINE_REGEX,
} from './constants.js';

/** A physical line of the file with its offsets */
interface SourceLine {
  text: string;
  start: number;
  /** Offset after the line terminator */
  end: number;
}

/** The leading comment block, before grammar matching */
interface LocatedBlock {
  start: number;
  end: number;
  lines: string[];
  terminated: boolean;
}

/** Comment-stripped header line with its 1-based file line number */
interface ContentLine {
  text: string;
  line: number;
}

type Interpretation =
  | { ok: true; header: HeaderModel; diagnostics: Diagnostic[] }
  | { ok: false; reason: MalformedReason; message: string; diagnostics: Diagnostic[] };

type EntryResult<T> = { ok: true; entry: T } | { ok: false; error: string };

const SYMBOL_ENTRY_PATTERNS = buildSymbolPatterns();

/**
 * Parse the header at the top of `text`, written in `dialect`.
 *
 * - `no-header`: no leading comment, or a leading comment that carries none
 *   of the protocol markers (banner, `TYPE:`, `REVIEWED-BY-HUMAN:`).
 * - `malformed`: a header-shaped block that violates the grammar.
 * - `header`: the parsed model. Unparseable entry lines inside a recognized
 *   section are dropped and reported as diagnostics.
 */
export function parseHeader(text: string, dialect: FileTypeDialect): ParseResult {
  const preambleEnd = findPreambleEnd(text);
  const block = locateBlock(text, preambleEnd, dialect.style);

  if (!block) {
    return { status: 'no-header', preambleEnd };
  }

  const firstLine = lineNumberAt(text, block.start);
  const content: ContentLine[] = block.lines.map((raw, i) => ({
    text: stripCommentSyntax(raw, dialect.style),
    line: firstLine + i,
  }));

  if (!content.some((l) => isProtocolMarker(l.text))) {
    return { status: 'no-header', preambleEnd };
  }

  const span: HeaderSpan = {
    start: preambleEnd,
    end: block.end,
    line: firstLine,
    terminated: block.terminated,
  };

  if (!block.terminated) {
    return {
      status: 'malformed',
      reason: 'unterminated',
      message: 'header comment is never closed',
      diagnostics: [],
      preambleEnd,
      span,
    };
  }

  const result = interpretHeader(content);
  if (!result.ok) {
    return {
      status: 'malformed',
      reason: result.reason,
      message: result.message,
      diagnostics: result.diagnostics,
      preambleEnd,
      span,
    };
  }

  return {
    status: 'header',
    header: result.header,
    diagnostics: result.diagnostics,
    preambleEnd,
    span,
  };
}

/**
 * Offset where the header may start: after a UTF-8 BOM and one preamble line
 * (shebang, XML declaration, `<?php`).
 */
export function findPreambleEnd(text: string): number {
  let offset = text.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK.length : 0;
  if (offset >= text.length) return offset;

  const first = readLine(text, offset);
  if (PREAMBLE_LINE_PATTERNS.some((pattern) => pattern.test(first.text))) {
    offset = first.end;
  }
  return offset;
}

/**
 * Remove comment syntax (opener, closer, decoration or line prefix) from one
 * raw line and trim it.
 */
export function stripCommentSyntax(line: string, style: CommentStyle): string {
  let s = line.trim();

  if (style.kind === 'line') {
    while (s.startsWith(style.prefix)) {
      s = s.slice(style.prefix.length);
    }
    return s.trim();
  }

  if (s.startsWith(style.open)) s = s.slice(style.open.length);
  if (s.endsWith(style.close)) s = s.slice(0, s.length - style.close.length);
  s = s.trim();
  if (style.decoration && s.startsWith(style.decoration)) {
    s = s.slice(style.decoration.length);
  }
  return s.trim();
}

// ---------------------------------------------------------------------------
// Block location
// ---------------------------------------------------------------------------

function readLine(text: string, offset: number): SourceLine {
  const nl = text.indexOf('\n', offset);
  if (nl === -1) {
    return { text: stripCarriageReturn(text.slice(offset)), start: offset, end: text.length };
  }
  return { text: stripCarriageReturn(text.slice(offset, nl)), start: offset, end: nl + 1 };
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function lineNumberAt(text: string, offset: number): number {
  let line = 1;
  for (let i = text.indexOf('\n'); i !== -1 && i < offset; i = text.indexOf('\n', i + 1)) {
    line++;
  }
  return line;
}

/**
 * Find the leading comment block starting at `from`, skipping blank lines.
 * The returned block's `start` is the first comment line; the header span
 * itself begins at `from` so leading blank lines are replaced on upsert.
 */
function locateBlock(text: string, from: number, style: CommentStyle): LocatedBlock | null {
  let offset = from;
  while (offset < text.length) {
    const line = readLine(text, offset);
    if (line.text.trim() !== '') break;
    offset = line.end;
  }
  if (offset >= text.length) return null;

  return style.kind === 'block'
    ? locateDelimitedBlock(text, offset, style.open, style.close)
    : locateLineRun(text, offset, style);
}

function locateDelimitedBlock(
  text: string,
  offset: number,
  open: string,
  close: string,
): LocatedBlock | null {
  const first = readLine(text, offset);
  const trimmed = first.text.trimStart();
  if (!trimmed.startsWith(open)) return null;

  const openAt = first.start + (first.text.length - trimmed.length);
  const closeAt = text.indexOf(close, openAt + open.length);

  if (closeAt === -1) {
    return {
      start: offset,
      end: text.length,
      lines: text.slice(offset).split(/\r?\n/),
      terminated: false,
    };
  }

  const closeEnd = closeAt + close.length;
  const nl = text.indexOf('\n', closeEnd);
  const restOfLine = text.slice(closeEnd, nl === -1 ? text.length : nl);

  // The closing line belongs to the block only when nothing follows the closer
  let end = closeEnd;
  if (restOfLine.trim() === '') {
    end = nl === -1 ? text.length : nl + 1;
  }

  return {
    start: offset,
    end,
    lines: text.slice(offset, closeEnd).split(/\r?\n/),
    terminated: true,
  };
}

/**
 * Collect consecutive prefixed lines. The run stops after the closing rule
 * line (a rule that follows header content) so a regular comment directly
 * under the header is not swallowed.
 */
function locateLineRun(
  text: string,
  offset: number,
  style: Extract<CommentStyle, { kind: 'line' }>,
): LocatedBlock | null {
  const lines: string[] = [];
  let cursor = offset;
  let end = offset;
  let sawContent = false;

  while (cursor < text.length) {
    const line = readLine(text, cursor);
    if (!line.text.trimStart().startsWith(style.prefix)) break;

    lines.push(line.text);
    end = line.end;
    cursor = line.end;

    const content = stripCommentSyntax(line.text, style);
    if (RULE_LINE_REGEX.test(content)) {
      if (sawContent) break;
    } else if (content !== '' && !isBanner(content)) {
      sawContent = true;
    }
  }

  if (lines.length === 0) return null;
  return { start: offset, end, lines, terminated: true };
}

// ---------------------------------------------------------------------------
// Grammar
// ---------------------------------------------------------------------------

function isBanner(text: string): boolean {
  return text.toUpperCase().includes(BANNER);
}

function isProtocolMarker(text: string): boolean {
  return isBanner(text) || TYPE_LINE_REGEX.test(text) || REVIEW_LINE_REGEX.test(text);
}

function matchCoverageType(value: string): CoverageType | null {
  for (const type of COVERAGE_TYPES) {
    if (COVERAGE_TYPE_PATTERNS[type].test(value)) return type;
  }
  return null;
}

function matchSectionTitle(text: string): SectionKey | null {
  for (const key of SECTION_ORDER) {
    if (SECTION_TITLE_PATTERNS[key].test(text)) return key;
  }
  return null;
}

/**
 * Match the comment-stripped lines against the grammar.
 */
function interpretHeader(lines: ContentLine[]): Interpretation {
  const diagnostics: Diagnostic[] = [];

  if (!lines.some((l) => isBanner(l.text))) {
    return { ok: false, reason: 'missing-banner', message: 'missing banner', diagnostics };
  }

  const typeLines = lines.filter((l) => TYPE_LINE_REGEX.test(l.text));
  const typeLine = typeLines[0];
  if (!typeLine) {
    return { ok: false, reason: 'missing-type', message: 'missing type', diagnostics };
  }
  for (const extra of typeLines.slice(1)) {
    diagnostics.push({ severity: 'warning', line: extra.line, message: 'duplicate TYPE line ignored' });
  }
  // Below the TYPE line the banner text is ordinary entry content
  const isBannerLine = (l: ContentLine): boolean => l.line < typeLine.line && isBanner(l.text);
  if (!lines.some(isBannerLine)) {
    return { ok: false, reason: 'missing-banner', message: 'missing banner', diagnostics };
  }

  const typeValue = (TYPE_LINE_REGEX.exec(typeLine.text)?.[1] ?? '').trim();
  const coverageType = matchCoverageType(typeValue);
  if (!coverageType) {
    return {
      ok: false,
      reason: 'invalid-type',
      message: `invalid type "${typeValue}"`,
      diagnostics,
    };
  }

  const reviewLines = lines.filter((l) => REVIEW_LINE_REGEX.test(l.text));
  const reviewLine = reviewLines[0];
  if (!reviewLine) {
    return { ok: false, reason: 'missing-review-flag', message: 'missing review flag', diagnostics };
  }
  for (const extra of reviewLines.slice(1)) {
    diagnostics.push({
      severity: 'warning',
      line: extra.line,
      message: 'duplicate REVIEWED-BY-HUMAN line ignored',
    });
  }

  const reviewValue = (REVIEW_LINE_REGEX.exec(reviewLine.text)?.[1] ?? '').trim();
  let reviewedByHuman: boolean;
  if (/^YES$/i.test(reviewValue)) {
    reviewedByHuman = true;
  } else if (/^NO$/i.test(reviewValue)) {
    reviewedByHuman = false;
  } else {
    return {
      ok: false,
      reason: 'invalid-review-flag',
      message: `invalid review flag "${reviewValue}"`,
      diagnostics,
    };
  }

  const header: HeaderModel = {
    coverageType,
    reviewedByHuman,
    methods: [],
    structs: [],
    traits: [],
    libraries: [],
  };

  let section: SectionKey | null = null;

  for (const content of lines) {
    const { text, line } = content;
    if (
      text === '' ||
      RULE_LINE_REGEX.test(text) ||
      isBannerLine(content) ||
      TYPE_LINE_REGEX.test(text) ||
      REVIEW_LINE_REGEX.test(text)
    ) {
      continue;
    }

    const title = matchSectionTitle(text);
    if (title) {
      section = title;
      continue;
    }

    const entryMatch = ENTRY_LINE_REGEX.exec(text);
    if (!entryMatch) {
      diagnostics.push({ severity: 'warning', line, message: `unrecognized line ignored: "${text}"` });
      continue;
    }

    if (!section) {
      diagnostics.push({ severity: 'warning', line, message: `entry outside of a section dropped: "${text}"` });
      continue;
    }

    const entryText = (entryMatch[1] ?? '').trim();
    if (section === 'libraries') {
      const parsed = parseLibraryEntry(entryText);
      if (parsed.ok) {
        header.libraries.push(parsed.entry);
      } else {
        diagnostics.push({ severity: 'warning', line, message: dropMessage(section, text, parsed.error) });
      }
    } else {
      const parsed = parseSymbolEntry(section, entryText);
      if (parsed.ok) {
        header[section].push(parsed.entry);
      } else {
        diagnostics.push({ severity: 'warning', line, message: dropMessage(section, text, parsed.error) });
      }
    }
  }

  return { ok: true, header, diagnostics };
}

function dropMessage(section: SectionKey, text: string, error: string): string {
  return `${SECTION_TITLES[section]} entry dropped (${error}): "${text}"`;
}

function buildSymbolPatterns(): Record<SymbolSectionKey, { whole: RegExp; lines: RegExp }> {
  const build = (key: SymbolSectionKey) => {
    const kinds = SYMBOL_KIND_ALIASES[key].join('|');
    return {
      whole: new RegExp(`^WHOLE\\s+CODE\\s+IN\\s+THE\\s+(?:${kinds})S?\\s+(\\S+)$`, 'i'),
      lines: new RegExp(
        `^(\\d+)\\s*~\\s*(\\d+)\\s+LINES?\\s+CODE\\s+IN\\s+THE\\s+(?:${kinds})S?\\s+(\\S+)$`,
        'i',
      ),
    };
  };
  return { methods: build('methods'), structs: build('structs'), traits: build('traits') };
}

function unquoteName(name: string): string {
  const quoted = QUOTED_NAME_REGEX.exec(name);
  return quoted?.[2] ?? name;
}

function parseSymbolEntry(section: SymbolSectionKey, text: string): EntryResult<SymbolEntry> {
  const patterns = SYMBOL_ENTRY_PATTERNS[section];

  const whole = patterns.whole.exec(text);
  if (whole?.[1]) {
    return { ok: true, entry: { name: unquoteName(whole[1]), extent: { kind: 'whole' } } };
  }

  const partial = patterns.lines.exec(text);
  if (partial?.[1] && partial[2] && partial[3]) {
    const start = Number(partial[1]);
    const end = Number(partial[2]);
    if (start < 1 || end < start) {
      return { ok: false, error: `invalid line range ${start}~${end}` };
    }
    return {
      ok: true,
      entry: { name: unquoteName(partial[3]), extent: { kind: 'lines', start, end } },
    };
  }

  return { ok: false, error: 'unrecognized format' };
}

function parseLibraryEntry(text: string): EntryResult<LibraryEntry> {
  const match = LIBRARY_ENTRY_REGEX.exec(text);
  if (!match?.[1] || !match[2]) {
    return { ok: false, error: 'expected "<name>: <reason>"' };
  }
  return { ok: true, entry: { name: match[1], reason: match[2].trim() } };
}
