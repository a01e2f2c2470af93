import * as fs from 'fs';
import * as path from 'path';
import { vi } from 'vitest';
import type { Logger } from 'pino';
import { resolveDialect, upsertHeader, type HeaderModel } from '@aigcap/core';

export function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

export function header(overrides: Partial<HeaderModel> = {}): HeaderModel {
  return {
    coverageType: 'WHOLE',
    reviewedByHuman: false,
    methods: [{ name: 'main', extent: { kind: 'whole' } }],
    structs: [],
    traits: [],
    libraries: [],
    ...overrides,
  };
}

/** `body` with an AIGCAP header for the dialect of `fileName` */
export function withHeader(fileName: string, body: string, overrides: Partial<HeaderModel> = {}): string {
  const dialect = resolveDialect(fileName);
  if (!dialect) throw new Error(`no dialect for ${fileName}`);
  return upsertHeader(body, header(overrides), dialect);
}

/** Write files relative to `root`, creating directories */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relPath, content] of Object.entries(files)) {
    const filePath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}
