import { describe, it, expect } from 'vitest';
import { upsertHeader, detectLineEnding } from '../upsert.js';
import { serializeHeader } from '../compose.js';
import { parseHeader } from '../parse.js';
import { HeaderFormatError } from '../errors.js';
import { BANNER } from '../constants.js';
import { cBlock, dialectFor, headerContent, sampleHeader } from './fixtures.js';

function countBanners(text: string): number {
  return text.split(BANNER).length - 1;
}

describe('upsertHeader', () => {
  const ts = dialectFor('app.ts');
  const header = sampleHeader();
  const block = serializeHeader(header, ts);

  it('should insert a header with one blank separator line', () => {
    const body = 'export const a = 1;\n';
    expect(upsertHeader(body, header, ts)).toBe(block + '\n' + body);
  });

  it('should collapse leading blank lines when inserting', () => {
    expect(upsertHeader('\n\nexport {};\n', header, ts)).toBe(block + '\nexport {};\n');
  });

  it('should write just the header into an empty file', () => {
    expect(upsertHeader('', header, ts)).toBe(block);
  });

  it('should keep a shebang ahead of the header', () => {
    const js = dialectFor('cli.js');
    const text = '#!/usr/bin/env node\nconsole.log(1);\n';

    expect(upsertHeader(text, header, js)).toBe(
      '#!/usr/bin/env node\n' + serializeHeader(header, js) + '\nconsole.log(1);\n',
    );
  });

  it('should terminate a preamble that has no line break', () => {
    const sh = dialectFor('run.sh');
    expect(upsertHeader('#!/bin/sh', header, sh)).toBe('#!/bin/sh\n' + serializeHeader(header, sh));
  });

  it('should be idempotent', () => {
    const once = upsertHeader('export const a = 1;\n', header, ts);
    expect(upsertHeader(once, header, ts)).toBe(once);
  });

  it('should replace an existing header without duplicating it', () => {
    const body = '\nexport const a = 1;\n';
    const original = upsertHeader(body.slice(1), header, ts);
    const reviewed = { ...header, reviewedByHuman: true };

    const updated = upsertHeader(original, reviewed, ts);

    expect(countBanners(updated)).toBe(1);
    expect(updated).toBe(serializeHeader(reviewed, ts) + body);
    const result = parseHeader(updated, ts);
    expect(result.status === 'header' && result.header.reviewedByHuman).toBe(true);
  });

  it('should replace a malformed header', () => {
    const malformed = cBlock(headerContent('WHOLE CODE IN THIS FILE', 'NO').filter((l) => !l.startsWith('REVIEWED')));
    const text = malformed + '\nint main(void) { return 0; }\n';
    const c = dialectFor('main.c');

    const updated = upsertHeader(text, header, c);

    expect(updated).toBe(serializeHeader(header, c) + '\nint main(void) { return 0; }\n');
    expect(countBanners(updated)).toBe(1);
  });

  it('should preserve CRLF line endings', () => {
    const py = dialectFor('tool.py');
    const text = 'import os\r\nprint(os.name)\r\n';

    expect(upsertHeader(text, header, py)).toBe(serializeHeader(header, py, '\r\n') + '\r\n' + text);
  });

  it('should refuse to replace a block comment that is never closed', () => {
    const text = '/*\n * THIS FILE INCLUDES AI GENERATED CODE\nexport {};\n';
    expect(() => upsertHeader(text, header, ts)).toThrow(HeaderFormatError);
  });
});

describe('detectLineEnding', () => {
  it('should pick the dominant line ending', () => {
    expect(detectLineEnding('a\r\nb\r\nc\n')).toBe('\r\n');
    expect(detectLineEnding('a\nb\r\nc\n')).toBe('\n');
  });

  it('should default to LF', () => {
    expect(detectLineEnding('')).toBe('\n');
    expect(detectLineEnding('a\r\nb\n')).toBe('\n');
  });
});
