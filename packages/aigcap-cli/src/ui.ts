import chalk from 'chalk';
import type { Classification, EnforcementState } from '@aigcap/core';
import type { CliResult } from './types.js';

type State = Classification | EnforcementState;

const STATE_COLORS: Record<State, (text: string) => string> = {
  Reviewed: chalk.green,
  Unreviewed: chalk.yellow,
  Malformed: chalk.red,
  Unheadered: chalk.red,
  NoAigcapHeader: chalk.dim,
  Unsupported: chalk.dim,
};

export function colorState(state: State): string {
  return STATE_COLORS[state](state);
}

/** Two-column `label value` line with the label padded */
export function row(label: string, value: string | number, width = 14): string {
  return `  ${chalk.dim(label.padEnd(width))} ${value}`;
}

export function errorText(message: string): string {
  return chalk.red(`Error: ${message}`);
}

export function ok(output: string): CliResult {
  return { success: true, output, errorOutput: '', exitCode: 0 };
}

export function fail(message: string, exitCode = 1, output = ''): CliResult {
  return { success: false, output, errorOutput: errorText(message), exitCode };
}

/**
 * Print a handler result and set the process exit code.
 */
export function emit(result: CliResult): void {
  if (result.output) console.log(result.output);
  if (result.errorOutput) console.error(result.errorOutput);
  process.exitCode = result.exitCode;
}
