/**
 * Enforcement state machine.
 *
 * Decides whether an agent's file operation satisfies the header protocol.
 * The only state is the header text itself: every decision is derived from
 * the proposed content (before a write) or from the prior and new content
 * (after an edit).
 *
 *   Unheadered --write w/ header, NO--> Unreviewed --human sets YES--> Reviewed
 *   Reviewed --agent edit--> must flip back to Unreviewed, otherwise warn
 */

import * as path from 'node:path';
import type { Logger } from 'pino';
import type { DialectTable, FileTypeDialect, ParseResult } from './types.js';
import { DEFAULT_PROTOCOL_PATH } from './constants.js';
import { defaultDialectTable, resolveDialect } from './dialects.js';
import { DEFAULT_EXCLUDE, createExcludeMatcher } from './exclude.js';
import { silentLogger } from './logger.js';
import { parseHeader } from './parse.js';
import { validateHeader } from './validate.js';

export type EnforcementState = 'Unheadered' | 'Unreviewed' | 'Reviewed' | 'Malformed';

export type BlockCode =
  | 'header-required'
  | 'reviewed-on-write'
  | 'missing-review-flag'
  | 'malformed-header'
  | 'invalid-header';

export type WarnCode = 'review-not-reset' | 'header-missing' | 'header-broken';

interface DecisionBase {
  /** Path as given by the caller */
  path: string;
  /** State before the operation; null for writes and new files */
  prior: EnforcementState | null;
  /** State after the operation; null when the file is not checked */
  next: EnforcementState | null;
}

export interface AllowDecision extends DecisionBase {
  action: 'allow';
}

export interface BlockDecision extends DecisionBase {
  action: 'block';
  code: BlockCode;
  /** Short cause, e.g. `header required` */
  reason: string;
  /** What the agent should do, pointing at the protocol document */
  guidance: string;
}

export interface WarnDecision extends DecisionBase {
  action: 'warn';
  code: WarnCode;
  message: string;
  guidance: string;
}

export type HookDecision = AllowDecision | BlockDecision | WarnDecision;

export interface EnforcementOptions {
  /** Dialect table (defaults to the built-in one) */
  dialects?: DialectTable;
  /** Extra excluded path segments, added to DEFAULT_EXCLUDE */
  exclude?: readonly string[];
  /** Project root; paths inside it are matched relative to it */
  root?: string;
  /** Protocol document referenced in block and warn guidance */
  protocolPath?: string;
  logger?: Logger;
}

/** File names the hook never checks (typically empty package markers) */
export const EXEMPT_FILE_NAMES: readonly string[] = ['__init__.py'];

/**
 * Map a parse result to its enforcement state.
 */
export function deriveState(result: ParseResult): EnforcementState {
  switch (result.status) {
    case 'no-header':
      return 'Unheadered';
    case 'malformed':
      return 'Malformed';
    case 'header':
      return result.header.reviewedByHuman ? 'Reviewed' : 'Unreviewed';
  }
}

/**
 * Check content an agent is about to write as a whole file.
 */
export function preWrite(
  filePath: string,
  proposedText: string,
  options: EnforcementOptions = {},
): HookDecision {
  const logger = componentLogger(options);
  const dialect = resolveCheckedDialect(filePath, options, logger);
  if (!dialect) {
    return { action: 'allow', path: filePath, prior: null, next: null };
  }

  const protocolPath = options.protocolPath ?? DEFAULT_PROTOCOL_PATH;
  const parsed = parseHeader(proposedText, dialect);
  const next = deriveState(parsed);
  const base = { path: filePath, prior: null, next };

  let decision: HookDecision;

  if (parsed.status === 'no-header') {
    decision = {
      ...base,
      action: 'block',
      code: 'header-required',
      reason: 'header required',
      guidance: `Read ${protocolPath} and include the header at the top of the file, then retry the write.`,
    };
  } else if (parsed.status === 'malformed') {
    decision =
      parsed.reason === 'missing-review-flag'
        ? {
            ...base,
            action: 'block',
            code: 'missing-review-flag',
            reason: 'missing review flag',
            guidance: `Add "REVIEWED-BY-HUMAN: NO" to the header (see ${protocolPath}) and retry.`,
          }
        : {
            ...base,
            action: 'block',
            code: 'malformed-header',
            reason: parsed.message,
            guidance: `Fix the header so it follows ${protocolPath} and retry.`,
          };
  } else if (parsed.header.reviewedByHuman) {
    decision = {
      ...base,
      action: 'block',
      code: 'reviewed-on-write',
      reason: 'new files must start unreviewed',
      guidance: 'Only a human may set REVIEWED-BY-HUMAN: YES. Write REVIEWED-BY-HUMAN: NO and retry.',
    };
  } else {
    const validation = validateHeader(parsed.header, dialect);
    decision = validation.valid
      ? { ...base, action: 'allow' }
      : {
          ...base,
          action: 'block',
          code: 'invalid-header',
          reason: validation.errors.map((e) => `${e.field}: ${e.message}`).join('; '),
          guidance: `Fix the header entries as described in ${protocolPath} and retry.`,
        };
  }

  logger.debug({ path: filePath, action: decision.action, next }, 'Pre-write decision');
  return decision;
}

/**
 * Check a file after an agent edited it in place. `priorText` is null when
 * the content before the edit is unknown; a `Reviewed` result is then
 * treated as a flag the edit left in place.
 */
export function postEdit(
  filePath: string,
  priorText: string | null,
  newText: string,
  options: EnforcementOptions = {},
): HookDecision {
  const logger = componentLogger(options);
  const dialect = resolveCheckedDialect(filePath, options, logger);
  if (!dialect) {
    return { action: 'allow', path: filePath, prior: null, next: null };
  }

  const protocolPath = options.protocolPath ?? DEFAULT_PROTOCOL_PATH;
  const prior = priorText === null ? null : deriveState(parseHeader(priorText, dialect));
  const parsed = parseHeader(newText, dialect);
  const next = deriveState(parsed);
  const base = { path: filePath, prior, next };

  let decision: HookDecision;

  if ((prior === 'Reviewed' || prior === null) && next === 'Reviewed') {
    decision = {
      ...base,
      action: 'warn',
      code: 'review-not-reset',
      message: 'REVIEWED-BY-HUMAN is still YES after your edit',
      guidance: 'You modified this file, so set REVIEWED-BY-HUMAN: NO in its header and save it again.',
    };
  } else if (parsed.status === 'no-header') {
    decision = {
      ...base,
      action: 'warn',
      code: 'header-missing',
      message: 'header missing after edit',
      guidance: `Read ${protocolPath} and add the header to the top of this file now.`,
    };
  } else if (parsed.status === 'malformed') {
    decision = {
      ...base,
      action: 'warn',
      code: 'header-broken',
      message: `header broken after edit: ${parsed.message}`,
      guidance: `Repair the header so it follows ${protocolPath}.`,
    };
  } else {
    decision = { ...base, action: 'allow' };
  }

  logger.debug({ path: filePath, action: decision.action, prior, next }, 'Post-edit decision');
  return decision;
}

/**
 * Text the hook prints for a decision; empty for `allow`.
 */
export function formatDecision(decision: HookDecision): string {
  switch (decision.action) {
    case 'allow':
      return '';
    case 'block':
      return `AIGCAP BLOCKED: '${decision.path}': ${decision.reason}.\n${decision.guidance}`;
    case 'warn':
      return `AIGCAP WARNING: '${decision.path}': ${decision.message}.\n${decision.guidance}`;
  }
}

function componentLogger(options: EnforcementOptions): Logger {
  return (options.logger ?? silentLogger()).child({ component: 'enforcement' });
}

/**
 * Dialect of a file the protocol applies to, or null when the file is
 * unsupported, exempt or excluded.
 */
function resolveCheckedDialect(
  filePath: string,
  options: EnforcementOptions,
  logger: Logger,
): FileTypeDialect | null {
  if (!filePath) return null;

  const dialect = resolveDialect(filePath, options.dialects ?? defaultDialectTable());
  if (!dialect) {
    logger.debug({ path: filePath }, 'Unsupported file type, skipping');
    return null;
  }

  if (EXEMPT_FILE_NAMES.includes(path.basename(filePath))) {
    logger.debug({ path: filePath }, 'Exempt file, skipping');
    return null;
  }

  const isExcluded = createExcludeMatcher([...DEFAULT_EXCLUDE, ...(options.exclude ?? [])]);
  if (isExcluded(matchPath(filePath, options.root))) {
    logger.debug({ path: filePath }, 'Excluded path, skipping');
    return null;
  }

  return dialect;
}

/** Path relative to `root` when inside it, otherwise the path as given */
function matchPath(filePath: string, root: string | undefined): string {
  const base = path.resolve(root ?? process.cwd());
  const relative = path.relative(base, path.resolve(base, filePath));
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return filePath;
  }
  return relative;
}
