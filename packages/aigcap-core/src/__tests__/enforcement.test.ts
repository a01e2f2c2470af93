import { describe, it, expect, vi } from 'vitest';
import type { Logger } from 'pino';
import { preWrite, postEdit, deriveState, formatDecision } from '../enforcement.js';
import { parseHeader } from '../parse.js';
import { upsertHeader } from '../upsert.js';
import { cBlock, dialectFor, headerContent, sampleHeader } from './fixtures.js';

const ts = dialectFor('app.ts');
const body = 'export const answer = 42;\n';
const unreviewed = upsertHeader(body, sampleHeader(), ts);
const reviewed = upsertHeader(body, sampleHeader({ reviewedByHuman: true }), ts);

describe('deriveState', () => {
  it('should map parse results to enforcement states', () => {
    expect(deriveState(parseHeader(body, ts))).toBe('Unheadered');
    expect(deriveState(parseHeader(unreviewed, ts))).toBe('Unreviewed');
    expect(deriveState(parseHeader(reviewed, ts))).toBe('Reviewed');
    expect(deriveState(parseHeader(cBlock(headerContent('MOSTLY', 'NO')), ts))).toBe('Malformed');
  });
});

describe('preWrite', () => {
  it('should block content without a header', () => {
    const decision = preWrite('src/app.ts', body, { protocolPath: '/docs/PROTOCOL.md' });

    expect(decision).toEqual({
      action: 'block',
      path: 'src/app.ts',
      prior: null,
      next: 'Unheadered',
      code: 'header-required',
      reason: 'header required',
      guidance:
        'Read /docs/PROTOCOL.md and include the header at the top of the file, then retry the write.',
    });
  });

  it('should block a header that claims human review', () => {
    const decision = preWrite('src/app.ts', reviewed);

    expect(decision.action).toBe('block');
    if (decision.action === 'block') {
      expect(decision.code).toBe('reviewed-on-write');
      expect(decision.reason).toBe('new files must start unreviewed');
      expect(decision.next).toBe('Reviewed');
    }
  });

  it('should block a header without a review flag', () => {
    const text = cBlock(
      headerContent('WHOLE CODE IN THIS FILE', 'NO', ['', 'METHOD(FUNCTIONS):', '- WHOLE CODE IN THE METHOD main']).filter(
        (l) => !l.startsWith('REVIEWED'),
      ),
    );

    const decision = preWrite('src/app.ts', text);

    expect(decision.action).toBe('block');
    if (decision.action === 'block') {
      expect(decision.code).toBe('missing-review-flag');
      expect(decision.reason).toBe('missing review flag');
    }
  });

  it('should block other malformed headers with the parse message', () => {
    const decision = preWrite('src/app.ts', cBlock(headerContent('MOSTLY', 'NO')));

    expect(decision.action).toBe('block');
    if (decision.action === 'block') {
      expect(decision.code).toBe('malformed-header');
      expect(decision.reason).toBe('invalid type "MOSTLY"');
    }
  });

  it('should block a header with no detail entries', () => {
    const decision = preWrite('src/app.ts', cBlock(headerContent('WHOLE CODE IN THIS FILE', 'NO')));

    expect(decision.action).toBe('block');
    if (decision.action === 'block') {
      expect(decision.code).toBe('invalid-header');
      expect(decision.reason).toBe(
        'sections: At least one of METHOD, STRUCTS, TRAIT or IMPORTED LIBRARY must list an entry',
      );
    }
  });

  it('should allow a valid unreviewed header', () => {
    expect(preWrite('src/app.ts', unreviewed)).toEqual({
      action: 'allow',
      path: 'src/app.ts',
      prior: null,
      next: 'Unreviewed',
    });
  });

  it('should allow unsupported file types', () => {
    expect(preWrite('README.md', '# Title\n')).toEqual({
      action: 'allow',
      path: 'README.md',
      prior: null,
      next: null,
    });
  });

  it('should allow excluded paths at any depth', () => {
    expect(preWrite('web/node_modules/pkg/index.js', body).next).toBeNull();
    expect(preWrite('/proj/target/debug/build.rs', body, { root: '/proj' }).next).toBeNull();
    expect(preWrite('src/generated/api.ts', body, { exclude: ['generated'] }).next).toBeNull();
  });

  it('should match exclusions relative to the project root', () => {
    const decision = preWrite('/work/build/app/src/a.ts', body, { root: '/work/build/app' });
    expect(decision.action).toBe('block');
  });

  it('should skip exempt package markers', () => {
    expect(preWrite('pkg/__init__.py', '').action).toBe('allow');
  });

  it('should log each decision through the injected logger', () => {
    const debug = vi.fn();
    const logger: Logger = {
      child: () => logger,
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    } as unknown as Logger;

    preWrite('src/app.ts', unreviewed, { logger });

    expect(debug).toHaveBeenCalledWith(
      { path: 'src/app.ts', action: 'allow', next: 'Unreviewed' },
      'Pre-write decision',
    );
  });
});

describe('postEdit', () => {
  it('should warn when a reviewed file is still marked reviewed', () => {
    const decision = postEdit('src/app.ts', reviewed, reviewed.replace('42', '43'));

    expect(decision).toMatchObject({
      action: 'warn',
      code: 'review-not-reset',
      prior: 'Reviewed',
      next: 'Reviewed',
    });
  });

  it('should allow an edit that resets the review flag', () => {
    const decision = postEdit('src/app.ts', reviewed, unreviewed);
    expect(decision).toEqual({ action: 'allow', path: 'src/app.ts', prior: 'Reviewed', next: 'Unreviewed' });
  });

  it('should warn when the edit removed the header', () => {
    const decision = postEdit('src/app.ts', unreviewed, body);

    expect(decision.action).toBe('warn');
    if (decision.action === 'warn') {
      expect(decision.code).toBe('header-missing');
      expect(decision.message).toBe('header missing after edit');
    }
  });

  it('should warn when the edit broke the header', () => {
    const broken = unreviewed.replace('REVIEWED-BY-HUMAN: NO', 'REVIEWED-BY-HUMAN: PERHAPS');
    const decision = postEdit('src/app.ts', unreviewed, broken);

    expect(decision.action).toBe('warn');
    if (decision.action === 'warn') {
      expect(decision.code).toBe('header-broken');
      expect(decision.message).toBe('header broken after edit: invalid review flag "PERHAPS"');
      expect(decision.next).toBe('Malformed');
    }
  });

  it('should stay silent for ordinary edits of unreviewed files', () => {
    expect(postEdit('src/app.ts', unreviewed, unreviewed.replace('42', '7')).action).toBe('allow');
  });

  it('should warn when the prior content is unknown and the file is still reviewed', () => {
    const decision = postEdit('src/app.ts', null, reviewed);

    expect(decision).toMatchObject({
      action: 'warn',
      code: 'review-not-reset',
      prior: null,
      next: 'Reviewed',
    });
  });

  it('should treat a missing prior file as no prior state', () => {
    expect(postEdit('src/app.ts', null, unreviewed)).toEqual({
      action: 'allow',
      path: 'src/app.ts',
      prior: null,
      next: 'Unreviewed',
    });
  });
});

describe('formatDecision', () => {
  it('should format a block for stderr', () => {
    const decision = preWrite('src/app.ts', body, { protocolPath: '/docs/PROTOCOL.md' });

    expect(formatDecision(decision)).toBe(
      "AIGCAP BLOCKED: 'src/app.ts': header required.\n" +
        'Read /docs/PROTOCOL.md and include the header at the top of the file, then retry the write.',
    );
  });

  it('should format nothing for allow', () => {
    expect(formatDecision(preWrite('src/app.ts', unreviewed))).toBe('');
  });
});
