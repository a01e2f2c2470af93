import { vi } from 'vitest';
import type { Logger } from 'pino';
import { resolveDialect } from '../dialects.js';
import { RULE } from '../constants.js';
import type { FileTypeDialect, HeaderModel } from '../types.js';

export function dialectFor(fileName: string): FileTypeDialect {
  const dialect = resolveDialect(fileName);
  if (!dialect) throw new Error(`no dialect for ${fileName}`);
  return dialect;
}

export function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

/** Header content lines (before comment wrapping) */
export function headerContent(type: string, reviewed: string, body: string[] = []): string[] {
  return [
    RULE,
    'THIS FILE INCLUDES AI GENERATED CODE',
    RULE,
    `TYPE: ${type}`,
    `REVIEWED-BY-HUMAN: ${reviewed}`,
    ...body,
    RULE,
  ];
}

/** Wrap content lines in a C-style block comment */
export function cBlock(content: string[]): string {
  return ['/*', ...content.map((l) => (l === '' ? ' *' : ` * ${l}`)), ' */'].join('\n') + '\n';
}

/** Prefix content lines with `#` */
export function hashBlock(content: string[]): string {
  return content.map((l) => (l === '' ? '#' : `# ${l}`)).join('\n') + '\n';
}

export function sampleHeader(overrides: Partial<HeaderModel> = {}): HeaderModel {
  return {
    coverageType: 'ABOVE_HALF',
    reviewedByHuman: false,
    methods: [
      { name: 'parseConfig', extent: { kind: 'whole' } },
      { name: 'loadAll', extent: { kind: 'lines', start: 3, end: 18 } },
    ],
    structs: [],
    traits: [],
    libraries: [{ name: 'zod', reason: 'schema validation' }],
    ...overrides,
  };
}
