import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { runCheck } from '../commands/check.js';
import { createMockLogger, withHeader, writeTree } from './helpers.js';

chalk.level = 0;

const body = 'export const answer = 42;\n';

describe('runCheck', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aigcap-check-test-'));
    writeTree(tmpDir, {
      'src/a.ts': withHeader('a.ts', body),
      'src/b.ts': withHeader('b.ts', body, { reviewedByHuman: true }),
      'lib/c.py': 'print(1)\n',
      'README.md': '# Project\n',
      'bad.ts': withHeader('bad.ts', body).replace('TYPE: WHOLE CODE IN THIS FILE', 'TYPE: MOSTLY'),
      'odd.ts': withHeader('odd.ts', body).replace(
        ' * - WHOLE CODE IN THE METHOD main\n',
        ' * - WHOLE CODE IN THE METHOD main\n * - SOMETHING ODD\n',
      ),
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function check(files: string[]) {
    return runCheck(files, {}, { cwd: tmpDir, env: {}, logger: createMockLogger() });
  }

  it('should print the state of each file and fail on files without a valid header', async () => {
    const result = await check(['src/a.ts', 'src/b.ts', 'lib/c.py', 'README.md', 'bad.ts']);

    expect(result.exitCode).toBe(1);
    expect(result.output.split('\n')).toEqual([
      'Unreviewed  src/a.ts',
      'Reviewed    src/b.ts',
      'Unheadered  lib/c.py',
      'Unsupported README.md',
      '    no comment dialect for this file type',
      'Malformed   bad.ts',
      '    invalid type "MOSTLY"',
    ]);
  });

  it('should pass when every file has a valid header', async () => {
    const result = await check(['src/a.ts', 'src/b.ts']);

    expect(result).toEqual({
      success: true,
      output: 'Unreviewed  src/a.ts\nReviewed    src/b.ts',
      errorOutput: '',
      exitCode: 0,
    });
  });

  it('should list parser diagnostics under the file', async () => {
    const result = await check(['odd.ts']);

    expect(result.exitCode).toBe(0);
    expect(result.output.split('\n')).toEqual([
      'Unreviewed  odd.ts',
      '    line 10: METHOD(FUNCTIONS): entry dropped (unrecognized format): "- SOMETHING ODD"',
    ]);
  });

  it('should report unreadable files', async () => {
    const result = await check(['missing.ts']);

    expect(result.exitCode).toBe(1);
    expect(result.output.split('\n')[0]).toBe('Unreadable  missing.ts');
  });
});
