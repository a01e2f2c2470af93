/**
 * aigcap hook: adapter between the host agent's tool hooks and the
 * enforcement state machine.
 *
 * The host pipes a JSON payload describing the tool call on stdin. Exit code
 * 2 with a message on stderr is fed back to the agent: before a Write it
 * blocks the call, after an Edit it is a warning (the edit already happened).
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import { z } from 'zod';
import { formatDecision, postEdit, preWrite, type HookDecision } from '@aigcap/core';
import type { CliResult, GlobalCommandOptions } from '../types.js';
import { createContext, type CommandDeps } from '../utils/context.js';
import { readStdin } from '../utils/stdin.js';
import { emit, errorText, ok } from '../ui.js';

export const HOOK_EVENTS = ['pre-write', 'post-edit'] as const;

export type HookEvent = (typeof HOOK_EVENTS)[number];

export interface HookCommandOptions extends GlobalCommandOptions {
  event?: string;
}

const editSchema = z.object({
  old_string: z.string(),
  new_string: z.string(),
  replace_all: z.boolean().optional(),
});

export type EditOperation = z.infer<typeof editSchema>;

export const hookPayloadSchema = z.object({
  hook_event_name: z.string().optional(),
  cwd: z.string().optional(),
  tool_name: z.string(),
  tool_input: z
    .object({
      file_path: z.string().optional(),
      path: z.string().optional(),
      content: z.string().optional(),
      old_string: z.string().optional(),
      new_string: z.string().optional(),
      replace_all: z.boolean().optional(),
      edits: z.array(editSchema).optional(),
    })
    .passthrough(),
  tool_response: z
    .object({
      originalFile: z.string().nullable().optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
});

export type HookPayload = z.infer<typeof hookPayloadSchema>;

const WRITE_TOOLS: readonly string[] = ['Write'];
const EDIT_TOOLS: readonly string[] = ['Edit', 'MultiEdit'];

export function registerHookCommand(program: Command): void {
  program
    .command('hook')
    .description('Check a tool call piped in by the agent host (JSON on stdin)')
    .option('--event <event>', `Force the check: ${HOOK_EVENTS.join(' | ')}`)
    .option('--config <file>', 'Config file (default: nearest .aigcap.yaml)')
    .option('--verbose', 'Debug logging on stderr')
    .action(async (options: HookCommandOptions) => {
      try {
        emit(await runHook(await readStdin(), options));
      } catch (error) {
        console.error(errorText(error instanceof Error ? error.message : String(error)));
        process.exit(1);
      }
    });
}

/**
 * Check one hook payload.
 *
 * Exit codes: 0 allow (or nothing to check), 2 block or warn with the
 * message in `errorOutput`, 1 for a bad `--event` value.
 */
export async function runHook(
  rawPayload: string,
  options: HookCommandOptions = {},
  deps: CommandDeps = {},
): Promise<CliResult> {
  let forcedEvent: HookEvent | null = null;
  if (options.event !== undefined) {
    if (!isHookEvent(options.event)) {
      return {
        success: false,
        output: '',
        errorOutput: errorText(`Unknown hook event "${options.event}" (expected ${HOOK_EVENTS.join(' or ')})`),
        exitCode: 1,
      };
    }
    forcedEvent = options.event;
  }

  const context = createContext(options, deps);
  const { logger } = context;

  const payload = parsePayload(rawPayload);
  if (!payload) {
    logger.debug('Hook payload is not a tool call; nothing to check');
    return ok('');
  }

  const event = forcedEvent ?? eventForTool(payload.tool_name);
  const target = payload.tool_input.file_path ?? payload.tool_input.path;
  if (!event || !target) {
    logger.debug({ tool: payload.tool_name }, 'Tool call has no file to check');
    return ok('');
  }

  const baseDir = payload.cwd ?? context.cwd;
  const filePath = path.resolve(baseDir, target);
  const enforcement = {
    dialects: context.dialects,
    exclude: context.config.exclude,
    root: baseDir,
    protocolPath: context.config.protocolPath,
    logger,
  };

  let decision: HookDecision;
  if (event === 'pre-write') {
    decision = preWrite(filePath, payload.tool_input.content ?? '', enforcement);
  } else {
    let newText: string;
    try {
      newText = await readFile(filePath, 'utf-8');
    } catch (error) {
      logger.debug({ filePath, err: error }, 'Edited file is not readable; nothing to check');
      return ok('');
    }
    decision = postEdit(filePath, priorText(payload, newText), newText, enforcement);
  }

  if (decision.action === 'allow') {
    return ok('');
  }
  return { success: false, output: '', errorOutput: formatDecision(decision), exitCode: 2 };
}

/**
 * Parse the stdin payload; null for anything that is not a tool call.
 */
export function parsePayload(rawPayload: string): HookPayload | null {
  let json: unknown;
  try {
    json = JSON.parse(rawPayload);
  } catch {
    return null;
  }
  const result = hookPayloadSchema.safeParse(json);
  return result.success ? result.data : null;
}

export function eventForTool(toolName: string): HookEvent | null {
  if (WRITE_TOOLS.includes(toolName)) return 'pre-write';
  if (EDIT_TOOLS.includes(toolName)) return 'post-edit';
  return null;
}

/**
 * Content of the file before the edit: the host's copy when it sends one,
 * otherwise the edits undone against the new text. Null when neither works.
 */
export function priorText(payload: HookPayload, newText: string): string | null {
  const original = payload.tool_response?.originalFile;
  if (typeof original === 'string') return original;

  const input = payload.tool_input;
  const edits: EditOperation[] =
    input.edits ??
    (input.old_string !== undefined && input.new_string !== undefined
      ? [{ old_string: input.old_string, new_string: input.new_string, replace_all: input.replace_all }]
      : []);
  if (edits.length === 0) return null;

  return reverseEdits(newText, edits);
}

/**
 * Undo string edits, last one first. Returns null when an edit's new text
 * cannot be located (or is empty) in the current text.
 */
export function reverseEdits(text: string, edits: readonly EditOperation[]): string | null {
  let current = text;
  for (const edit of [...edits].reverse()) {
    if (edit.new_string === '' || !current.includes(edit.new_string)) {
      return null;
    }
    current = edit.replace_all
      ? current.split(edit.new_string).join(edit.old_string)
      : current.replace(edit.new_string, () => edit.old_string);
  }
  return current;
}

function isHookEvent(value: string): value is HookEvent {
  return (HOOK_EVENTS as readonly string[]).includes(value);
}
