import { destination, pino, type Logger } from 'pino';
import { z } from 'zod';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface CliLoggerOptions {
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * `--verbose` wins, then AIGCAP_LOG_LEVEL; unknown values fall back to warn.
 */
export function resolveLogLevel(options: CliLoggerOptions = {}): LogLevel {
  if (options.verbose) return 'debug';
  const env = options.env ?? process.env;
  const parsed = logLevelSchema.safeParse(env['AIGCAP_LOG_LEVEL']?.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

/**
 * CLI logger. Writes to stderr so stdout stays free for command output.
 */
export function createCliLogger(options: CliLoggerOptions = {}): Logger {
  return pino(
    { name: 'aigcap', level: resolveLogLevel(options) },
    destination({ dest: 2, sync: true }),
  );
}
