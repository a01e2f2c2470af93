/**
 * aigcap review: mark files as reviewed by a human.
 *
 * Rewrites the header through the serializer, so the rest of the block is
 * normalised and the file body is left untouched.
 */

import { readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  HeaderFormatError,
  parseHeader,
  resolveDialect,
  upsertHeader,
  validateHeader,
  type DialectTable,
} from '@aigcap/core';
import type { Logger } from 'pino';
import type { CliResult, GlobalCommandOptions } from '../types.js';
import { createContext, type CommandDeps } from '../utils/context.js';
import { emit, errorText } from '../ui.js';

export type ReviewOutcome = 'reviewed' | 'already-reviewed' | 'refused';

export interface FileReview {
  file: string;
  outcome: ReviewOutcome;
  message?: string;
}

export function registerReviewCommand(program: Command): void {
  program
    .command('review')
    .description('Set REVIEWED-BY-HUMAN: YES in the header of files you have reviewed')
    .argument('<files...>', 'Files to mark as reviewed')
    .option('--config <file>', 'Config file (default: nearest .aigcap.yaml)')
    .option('--verbose', 'Debug logging on stderr')
    .action(async (files: string[], options: GlobalCommandOptions) => {
      try {
        emit(await runReview(files, options));
      } catch (error) {
        console.error(errorText(error instanceof Error ? error.message : String(error)));
        process.exit(1);
      }
    });
}

/**
 * Mark each file as reviewed. Files without a valid header are refused and
 * left unchanged; any refusal makes the exit code 1.
 */
export async function runReview(
  files: readonly string[],
  options: GlobalCommandOptions = {},
  deps: CommandDeps = {},
): Promise<CliResult> {
  const context = createContext(options, deps);
  const logger = context.logger.child({ component: 'review' });
  const results: FileReview[] = [];

  for (const file of files) {
    results.push(await reviewFile(file, path.resolve(context.cwd, file), context.dialects, logger));
  }

  const output: string[] = [];
  const errors: string[] = [];
  for (const result of results) {
    if (result.outcome === 'reviewed') {
      output.push(`${chalk.green('Reviewed')}          ${result.file}`);
    } else if (result.outcome === 'already-reviewed') {
      output.push(`${chalk.dim('Already reviewed')}  ${result.file}`);
    } else {
      errors.push(errorText(`${result.file}: ${result.message ?? 'refused'}`));
    }
  }

  const refused = errors.length > 0;
  return {
    success: !refused,
    output: output.join('\n'),
    errorOutput: errors.join('\n'),
    exitCode: refused ? 1 : 0,
  };
}

async function reviewFile(
  file: string,
  absPath: string,
  dialects: DialectTable,
  logger: Logger,
): Promise<FileReview> {
  const dialect = resolveDialect(absPath, dialects);
  if (!dialect) {
    return { file, outcome: 'refused', message: 'unsupported file type' };
  }

  let text: string;
  try {
    text = await readFile(absPath, 'utf-8');
  } catch (error) {
    return { file, outcome: 'refused', message: error instanceof Error ? error.message : String(error) };
  }

  const parsed = parseHeader(text, dialect);
  if (parsed.status === 'no-header') {
    return { file, outcome: 'refused', message: 'no AIGCAP header' };
  }
  if (parsed.status === 'malformed') {
    return { file, outcome: 'refused', message: `malformed header: ${parsed.message}` };
  }
  if (parsed.header.reviewedByHuman) {
    return { file, outcome: 'already-reviewed' };
  }

  // Rewriting would silently drop the lines the parser skipped
  const [firstDiagnostic] = parsed.diagnostics;
  if (firstDiagnostic) {
    return {
      file,
      outcome: 'refused',
      message: `header line ${firstDiagnostic.line}: ${firstDiagnostic.message}`,
    };
  }

  const validation = validateHeader(parsed.header, dialect);
  if (!validation.valid) {
    return {
      file,
      outcome: 'refused',
      message: `invalid header: ${validation.errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`,
    };
  }

  let updated: string;
  try {
    updated = upsertHeader(text, { ...parsed.header, reviewedByHuman: true }, dialect);
  } catch (error) {
    if (error instanceof HeaderFormatError) {
      return { file, outcome: 'refused', message: error.message };
    }
    throw error;
  }

  await writeFile(absPath, updated, 'utf-8');
  logger.info({ file: absPath }, 'Marked as reviewed');
  return { file, outcome: 'reviewed' };
}
