import type { Logger } from 'pino';
import { createDialectTable, type DialectTable } from '@aigcap/core';
import type { GlobalCommandOptions } from '../types.js';
import { resolveConfig, type AigcapConfig } from './config.js';
import { createCliLogger } from './logger.js';

/** What a handler may take from its caller instead of the process */
export interface CommandDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export interface CommandContext {
  cwd: string;
  config: AigcapConfig;
  dialects: DialectTable;
  logger: Logger;
}

/**
 * Load config and build the dialect table and logger for one command run.
 *
 * @throws ConfigError if the config file is unreadable or invalid.
 */
export function createContext(options: GlobalCommandOptions, deps: CommandDeps = {}): CommandContext {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? createCliLogger({ verbose: options.verbose, env });
  const config = resolveConfig({ configPath: options.config, cwd, env });

  logger.debug({ cwd, exclude: config.exclude, dialects: Object.keys(config.dialects) }, 'Configuration loaded');

  return { cwd, config, dialects: createDialectTable(config.dialects), logger };
}
