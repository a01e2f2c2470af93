/**
 * Insert or replace the header at the top of a file's text.
 */

import type { FileTypeDialect, HeaderModel } from './types.js';
import { BYTE_ORDER_MARK } from './constants.js';
import { HeaderFormatError } from './errors.js';
import { parseHeader } from './parse.js';
import { serializeHeader } from './compose.js';

export type LineEnding = '\n' | '\r\n';

/**
 * Dominant line ending of `text`; `\n` on a tie or when there are none.
 */
export function detectLineEnding(text: string): LineEnding {
  let crlf = 0;
  let lf = 0;
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    if (i > 0 && text[i - 1] === '\r') crlf++;
    else lf++;
  }
  return crlf > lf ? '\r\n' : '\n';
}

/**
 * Write `header` into `text`.
 *
 * An existing (or malformed) header block is replaced in place. Otherwise the
 * header goes right after the preamble, followed by one blank line. Applying
 * the same header twice yields the same text.
 *
 * @throws HeaderFormatError if the header is invalid, or the existing block
 *   comment is never closed (replacing it would swallow the file).
 */
export function upsertHeader(text: string, header: HeaderModel, dialect: FileTypeDialect): string {
  const eol = detectLineEnding(text);
  const block = serializeHeader(header, dialect, eol);
  const parsed = parseHeader(text, dialect);

  let preamble = text.slice(0, parsed.preambleEnd);
  if (preamble !== '' && preamble !== BYTE_ORDER_MARK && !preamble.endsWith('\n')) {
    preamble += eol;
  }

  if (parsed.status === 'no-header') {
    const rest = text.slice(parsed.preambleEnd).replace(/^(?:[ \t]*\r?\n)+/, '');
    if (rest.trim() === '') {
      return preamble + block;
    }
    return preamble + block + eol + rest;
  }

  if (!parsed.span.terminated) {
    throw new HeaderFormatError(
      `Cannot replace a header comment that is never closed (line ${parsed.span.line})`,
    );
  }

  return preamble + block + text.slice(parsed.span.end);
}
