/**
 * aigcap scan: coverage dashboard, JSON export and CI gate
 */

import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  ScanRootError,
  ciDecision,
  parseExcludeList,
  percentage,
  renderReport,
  scanProject,
  type ProjectReport,
} from '@aigcap/core';
import type { CliResult, GlobalCommandOptions } from '../types.js';
import { createContext, type CommandDeps } from '../utils/context.js';
import { openInBrowser } from '../utils/browser.js';
import { emit, errorText, fail, row } from '../ui.js';

export const DEFAULT_REPORT_FILE = 'ai_coverage_report.html';

export interface ScanCommandOptions extends GlobalCommandOptions {
  output?: string;
  json?: string;
  exclude?: string;
  ci?: boolean;
  /** false with --no-open */
  open?: boolean;
  quiet?: boolean;
}

export interface ScanDeps extends CommandDeps {
  openBrowser?: (filePath: string) => Promise<void>;
  now?: () => Date;
}

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Scan a project and write the AI code coverage dashboard')
    .argument('[path]', 'Project root', '.')
    .option('-o, --output <file>', `HTML dashboard file (default: ${DEFAULT_REPORT_FILE})`)
    .option('--json <file>', 'Also write the report as JSON')
    .option('--exclude <list>', 'Extra comma-separated path segments to skip')
    .option('--ci', 'Exit 1 while any file is unreviewed')
    .option('--no-open', 'Do not open the dashboard in a browser')
    .option('-q, --quiet', 'Print nothing but errors')
    .option('--config <file>', 'Config file (default: nearest .aigcap.yaml)')
    .option('--verbose', 'Debug logging on stderr')
    .action(async (target: string, options: ScanCommandOptions) => {
      try {
        emit(await runScan(target, options));
      } catch (error) {
        console.error(errorText(error instanceof Error ? error.message : String(error)));
        process.exit(2);
      }
    });
}

/**
 * Scan `target`, write the reports and apply the CI gate.
 *
 * Exit codes: 0 done, 1 CI gate failed, 2 root missing or report unwritable.
 * The reports are written before the gate is evaluated.
 */
export async function runScan(
  target: string | undefined,
  options: ScanCommandOptions = {},
  deps: ScanDeps = {},
): Promise<CliResult> {
  const context = createContext(options, deps);
  const { cwd, config, logger } = context;
  const root = path.resolve(cwd, target ?? '.');
  const htmlPath = path.resolve(cwd, options.output ?? config.output ?? DEFAULT_REPORT_FILE);
  const jsonPath = options.json ? path.resolve(cwd, options.json) : null;

  let report: ProjectReport;
  try {
    report = await scanProject(root, {
      exclude: [...config.exclude, ...parseExcludeList(options.exclude)],
      skipFiles: jsonPath ? [htmlPath, jsonPath] : [htmlPath],
      dialects: context.dialects,
      concurrency: config.concurrency,
      logger,
      now: deps.now,
    });
  } catch (error) {
    if (error instanceof ScanRootError) {
      return fail(error.message, 2);
    }
    throw error;
  }

  const rendered = renderReport(report);

  const written = [await writeReport(htmlPath, rendered.html)];
  if (jsonPath) {
    written.push(await writeReport(jsonPath, rendered.json));
  }
  const writeError = written.find((w): w is string => w !== null);
  if (writeError) {
    return fail(writeError, 2);
  }
  logger.info({ htmlPath, jsonPath, files: report.overall.files }, 'Reports written');

  const lines: string[] = [];
  if (!options.quiet) {
    lines.push(...formatSummary(report), '', `Dashboard: ${htmlPath}`);
    if (jsonPath) lines.push(`JSON:      ${jsonPath}`);
  }

  if (options.ci) {
    const gate = ciDecision(report);
    if (gate.status === 'fail') {
      const count = gate.unreviewedFiles.length;
      return {
        success: false,
        output: lines.join('\n'),
        errorOutput: [
          chalk.red(`CI gate: FAIL (${count} unreviewed file${count === 1 ? '' : 's'})`),
          ...gate.unreviewedFiles.map((file) => `  - ${file}`),
        ].join('\n'),
        exitCode: 1,
      };
    }
    if (!options.quiet) lines.push(chalk.green('CI gate: PASS'));
  } else if (options.open !== false && !options.quiet) {
    await (deps.openBrowser ?? ((file: string) => openInBrowser(file, logger)))(htmlPath);
  }

  return { success: true, output: lines.join('\n'), errorOutput: '', exitCode: 0 };
}

/**
 * Console summary of a report.
 */
export function formatSummary(report: ProjectReport): string[] {
  const { totals, overall } = report;
  const supported = overall.files - totals.Unsupported;
  const lines = [
    chalk.blue(`AI code coverage: ${report.root}`),
    row('Files', `${overall.files} (${supported} supported)`),
    row('Reviewed', totals.Reviewed),
    row('Unreviewed', totals.Unreviewed),
    row('Malformed', totals.Malformed),
    row('No header', totals.NoAigcapHeader),
    row('Unsupported', totals.Unsupported),
    row('AI lines', `${overall.aiLines} / ${overall.lines} (${percentage(overall.aiLines, overall.lines)}%)`),
  ];
  if (report.ioFailures.length > 0) {
    lines.push(row('Unreadable', report.ioFailures.length));
  }
  return lines;
}

/** Write one report file; returns an error message instead of throwing */
async function writeReport(filePath: string, content: string): Promise<string | null> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
    return null;
  } catch (error) {
    return `Cannot write report ${filePath}: ${error instanceof Error ? error.message : String(error)}`;
  }
}
