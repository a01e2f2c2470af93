/**
 * aigcap check: print the header state of individual files
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  deriveState,
  parseHeader,
  resolveDialect,
  validateHeader,
  type DialectTable,
  type Diagnostic,
  type EnforcementState,
} from '@aigcap/core';
import type { CliResult, GlobalCommandOptions } from '../types.js';
import { createContext, type CommandDeps } from '../utils/context.js';
import { colorState, emit, errorText } from '../ui.js';

export type CheckState = EnforcementState | 'Unsupported' | 'Unreadable';

export interface FileCheck {
  file: string;
  state: CheckState;
  /** Malformed reason, validation errors or read failure */
  problems: string[];
  diagnostics: Diagnostic[];
}

/** Width of the state column, one more than the longest state */
const STATE_COLUMN = 12;

const FAILING_STATES: readonly CheckState[] = ['Unheadered', 'Malformed', 'Unsupported', 'Unreadable'];

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Print the AIGCAP header state of files')
    .argument('<files...>', 'Files to check')
    .option('--config <file>', 'Config file (default: nearest .aigcap.yaml)')
    .option('--verbose', 'Debug logging on stderr')
    .action(async (files: string[], options: GlobalCommandOptions) => {
      try {
        emit(await runCheck(files, options));
      } catch (error) {
        console.error(errorText(error instanceof Error ? error.message : String(error)));
        process.exit(1);
      }
    });
}

/**
 * Check each file. Exit 1 if any is unheadered, malformed, unsupported or
 * unreadable. A header that parses but fails validation counts as malformed.
 */
export async function runCheck(
  files: readonly string[],
  options: GlobalCommandOptions = {},
  deps: CommandDeps = {},
): Promise<CliResult> {
  const context = createContext(options, deps);
  const checks: FileCheck[] = [];

  for (const file of files) {
    checks.push(await checkFile(file, path.resolve(context.cwd, file), context.dialects));
  }

  const failing = checks.filter((c) => FAILING_STATES.includes(c.state));
  context.logger.debug({ files: checks.length, failing: failing.length }, 'Check finished');

  const output = checks.flatMap(formatCheck).join('\n');
  return {
    success: failing.length === 0,
    output,
    errorOutput: '',
    exitCode: failing.length === 0 ? 0 : 1,
  };
}

async function checkFile(
  file: string,
  absPath: string,
  dialects: DialectTable,
): Promise<FileCheck> {
  const dialect = resolveDialect(absPath, dialects);
  if (!dialect) {
    return { file, state: 'Unsupported', problems: ['no comment dialect for this file type'], diagnostics: [] };
  }

  let text: string;
  try {
    text = await readFile(absPath, 'utf-8');
  } catch (error) {
    return {
      file,
      state: 'Unreadable',
      problems: [error instanceof Error ? error.message : String(error)],
      diagnostics: [],
    };
  }

  const parsed = parseHeader(text, dialect);
  switch (parsed.status) {
    case 'no-header':
      return { file, state: 'Unheadered', problems: [], diagnostics: [] };
    case 'malformed':
      return { file, state: 'Malformed', problems: [parsed.message], diagnostics: [] };
    case 'header': {
      const validation = validateHeader(parsed.header, dialect);
      if (!validation.valid) {
        return {
          file,
          state: 'Malformed',
          problems: validation.errors.map((e) => `${e.field}: ${e.message}`),
          diagnostics: parsed.diagnostics,
        };
      }
      return { file, state: deriveState(parsed), problems: [], diagnostics: parsed.diagnostics };
    }
  }
}

function formatCheck(check: FileCheck): string[] {
  const state = check.state === 'Unreadable' ? chalk.red(check.state) : colorState(check.state);
  return [
    `${state}${' '.repeat(STATE_COLUMN - check.state.length)}${check.file}`,
    ...check.problems.map((p) => `    ${chalk.red(p)}`),
    ...check.diagnostics.map((d) => `    ${chalk.dim(`line ${d.line}: ${d.message}`)}`),
  ];
}
