/**
 * Project configuration loader.
 *
 * Reads `.aigcap.yaml` (found by walking up from the working directory, or
 * named with `--config`), validates it and applies environment overrides.
 * A project without a config file gets the defaults.
 *
 * ```yaml
 * exclude: [generated, fixtures]
 * dialects:
 *   .vue: { language: Vue, style: html }
 * protocolPath: docs/AIGCAP_PROTOCOL.md
 * output: reports/ai_coverage.html
 * concurrency: 8
 * ```
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { dialectEntrySchema, parseExcludeList, type DialectEntry } from '@aigcap/core';

export const CONFIG_FILE_NAME = '.aigcap.yaml';

export interface AigcapConfig {
  /** Extra excluded path segments */
  exclude: string[];
  /** Extension rows added to (or replacing) the built-in dialect table */
  dialects: Record<string, DialectEntry>;
  protocolPath?: string;
  /** Default dashboard output file */
  output?: string;
  concurrency?: number;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

export type ConfigLoadResult =
  | { success: true; config: AigcapConfig; source: string | null }
  | { success: false; errors: ConfigValidationError[] };

export interface LoadConfigOptions {
  /** Explicit config file; relative paths resolve against `cwd` */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const configSchema = z
  .object({
    exclude: z.array(z.string().min(1)).default([]),
    dialects: z.record(z.string().regex(/^\.?[^\s./\\]+$/, 'Invalid extension'), dialectEntrySchema).default({}),
    protocolPath: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    concurrency: z.number().int().positive().optional(),
  })
  .strict();

/** Thrown by `resolveConfig` when the config file is unreadable or invalid */
export class ConfigError extends Error {
  public readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    super(`Invalid configuration: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Find `.aigcap.yaml` in `startDir` or the nearest ancestor.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config YAML, then apply environment overrides.
 * An empty document yields the defaults.
 */
export function loadConfigFromString(
  yamlContent: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigLoadResult {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: `Failed to parse YAML: ${err instanceof Error ? err.message : String(err)}` }],
    };
  }

  if (parsed === undefined || parsed === null) {
    parsed = {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    return {
      success: false,
      errors: [{ field: 'yaml', message: 'Config must be a YAML mapping' }],
    };
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : 'config',
        message: issue.message,
      })),
    };
  }

  return { success: true, config: applyEnvOverrides(result.data, env), source: null };
}

/**
 * Load the project config: the explicit file, else the nearest
 * `.aigcap.yaml`, else the defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigLoadResult {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const source = options.configPath ? path.resolve(cwd, options.configPath) : findConfigFile(cwd);

  if (!source) {
    return { success: true, config: applyEnvOverrides({ exclude: [], dialects: {} }, env), source: null };
  }

  let rawYaml: string;
  try {
    rawYaml = readFileSync(source, 'utf-8');
  } catch (err) {
    return {
      success: false,
      errors: [
        {
          field: 'configPath',
          message: `Failed to read config file ${source}: ${err instanceof Error ? err.message : String(err)}`,
        },
      ],
    };
  }

  const result = loadConfigFromString(rawYaml, env);
  return result.success ? { ...result, source } : result;
}

/**
 * Like `loadConfig`, but throws ConfigError on failure.
 */
export function resolveConfig(options: LoadConfigOptions = {}): AigcapConfig {
  const result = loadConfig(options);
  if (!result.success) {
    throw new ConfigError(result.errors);
  }
  return result.config;
}

function applyEnvOverrides(config: AigcapConfig, env: NodeJS.ProcessEnv): AigcapConfig {
  const protocolPath = env['AIGCAP_PROTOCOL_PATH'];
  return {
    ...config,
    exclude: [...config.exclude, ...parseExcludeList(env['AIGCAP_EXCLUDE'])],
    ...(protocolPath ? { protocolPath } : {}),
  };
}
