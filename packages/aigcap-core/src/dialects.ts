/**
 * Comment dialect table.
 *
 * Maps a file extension to the comment convention its header is written in.
 * The extension list is data (`data/dialects.json`); the comment styles are a
 * closed set defined here. Adding a language means adding a row, or a
 * `dialects:` entry in the project config.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type {
  CommentStyle,
  CommentStyleName,
  DialectTable,
  FileTypeDialect,
} from './types.js';

export const COMMENT_STYLES = {
  'c-block': { kind: 'block', open: '/*', close: '*/', decoration: '*' },
  'ml-block': { kind: 'block', open: '(*', close: '*)', decoration: '*' },
  html: { kind: 'block', open: '<!--', close: '-->', decoration: '' },
  hash: { kind: 'line', prefix: '#' },
  dash: { kind: 'line', prefix: '--' },
  slash: { kind: 'line', prefix: '//' },
  percent: { kind: 'line', prefix: '%' },
  semicolon: { kind: 'line', prefix: ';' },
} as const satisfies Record<CommentStyleName, CommentStyle>;

const STYLE_NAMES = [
  'c-block',
  'ml-block',
  'html',
  'hash',
  'dash',
  'slash',
  'percent',
  'semicolon',
] as const satisfies readonly CommentStyleName[];

export const commentStyleNameSchema = z.enum(STYLE_NAMES);

/** One row of the extension table */
export const dialectEntrySchema = z.object({
  language: z.string().min(1),
  style: commentStyleNameSchema,
});

export type DialectEntry = z.infer<typeof dialectEntrySchema>;

const dialectFileSchema = z.object({
  extensions: z.record(z.string(), dialectEntrySchema),
});

const DIALECT_DATA_URL = new URL('../data/dialects.json', import.meta.url);

let builtinEntries: Record<string, DialectEntry> | null = null;
let defaultTable: DialectTable | null = null;

function loadBuiltinEntries(): Record<string, DialectEntry> {
  if (!builtinEntries) {
    const raw: unknown = JSON.parse(readFileSync(DIALECT_DATA_URL, 'utf-8'));
    builtinEntries = dialectFileSchema.parse(raw).extensions;
  }
  return builtinEntries;
}

/**
 * Normalize an extension key: lower-case, leading dot.
 */
export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Build a dialect table from the built-in rows plus optional overrides.
 * Overrides replace built-in rows with the same extension.
 */
export function createDialectTable(
  overrides: Record<string, DialectEntry> = {},
): DialectTable {
  const table = new Map<string, FileTypeDialect>();
  const rows = { ...loadBuiltinEntries() };
  for (const [ext, entry] of Object.entries(overrides)) {
    rows[normalizeExtension(ext)] = entry;
  }

  for (const [ext, entry] of Object.entries(rows)) {
    const extension = normalizeExtension(ext);
    table.set(extension, {
      extension,
      language: entry.language,
      styleName: entry.style,
      style: COMMENT_STYLES[entry.style],
    });
  }

  return table;
}

/** The built-in table (no overrides), built once */
export function defaultDialectTable(): DialectTable {
  if (!defaultTable) {
    defaultTable = createDialectTable();
  }
  return defaultTable;
}

/**
 * Resolve the dialect for a file path by its extension.
 * Returns null for unsupported files (no extension, or not in the table).
 */
export function resolveDialect(
  filePath: string,
  table: DialectTable = defaultDialectTable(),
): FileTypeDialect | null {
  const ext = path.extname(filePath);
  if (!ext) return null;
  return table.get(ext.toLowerCase()) ?? null;
}
