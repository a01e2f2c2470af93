import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { scanProject, classifyText, countLines } from '../scanner.js';
import { ciDecision } from '../aggregate.js';
import { ScanRootError } from '../errors.js';
import { upsertHeader } from '../upsert.js';
import { cBlock, createMockLogger, dialectFor, headerContent, sampleHeader } from './fixtures.js';

describe('scanProject', () => {
  let tmpDir: string;
  const ts = dialectFor('a.ts');
  const body = 'export const a = 1;\n';

  function write(relPath: string, content: string): void {
    const full = path.join(tmpDir, relPath);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aigcap-scan-test-'));

    write('src/a.ts', upsertHeader(body, sampleHeader(), ts));
    write('src/b.ts', upsertHeader(body, sampleHeader({ coverageType: 'WHOLE', reviewedByHuman: true }), ts));
    write('lib/c.py', "print('hi')\n");
    write('README.md', '# Readme\n');
    write(
      'bad.ts',
      cBlock(headerContent('WHOLE CODE IN THIS FILE', 'NO').filter((l) => !l.startsWith('REVIEWED'))),
    );
    write('node_modules/x/index.js', body);
    write('deep/build/out.js', body);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should classify every file and skip excluded directories', async () => {
    const report = await scanProject(tmpDir, { logger: createMockLogger() });

    expect(report.files.map((f) => [f.path, f.classification])).toEqual([
      ['README.md', 'Unsupported'],
      ['bad.ts', 'Malformed'],
      ['lib/c.py', 'NoAigcapHeader'],
      ['src/a.ts', 'Unreviewed'],
      ['src/b.ts', 'Reviewed'],
    ]);
    expect(report.totals).toEqual({
      NoAigcapHeader: 1,
      Unreviewed: 1,
      Reviewed: 1,
      Malformed: 1,
      Unsupported: 1,
    });
    expect(report.unreviewedFiles).toEqual(['src/a.ts']);
    expect(report.ioFailures).toEqual([]);
    expect(report.root).toBe(path.resolve(tmpDir));
  });

  it('should record sizes, line counts and estimates', async () => {
    const report = await scanProject(tmpDir);
    const byPath = new Map(report.files.map((f) => [f.path, f]));

    expect(byPath.get('README.md')).toMatchObject({ bytes: 9, lines: 0, aiLines: 0, language: null });
    expect(byPath.get('lib/c.py')).toMatchObject({ bytes: 12, lines: 1, aiLines: 0, language: 'Python' });
    // 15 header lines, a blank separator and the body
    expect(byPath.get('src/a.ts')).toMatchObject({ lines: 17, aiLines: 17, directory: 'src' });
    expect(byPath.get('bad.ts')).toMatchObject({
      malformedReason: 'missing-review-flag',
      malformedMessage: 'missing review flag',
      directory: '.',
    });
  });

  it('should group files by top-level directory', async () => {
    const report = await scanProject(tmpDir);

    expect(report.byDirectory.map((d) => [d.directory, d.files])).toEqual([
      ['.', 2],
      ['lib', 1],
      ['src', 2],
    ]);
    expect(report.byDirectory[2]?.counts).toEqual({
      NoAigcapHeader: 0,
      Unreviewed: 1,
      Reviewed: 1,
      Malformed: 0,
      Unsupported: 0,
    });
  });

  it('should flip the CI gate once the last file is reviewed', async () => {
    expect(ciDecision(await scanProject(tmpDir))).toEqual({
      status: 'fail',
      unreviewedFiles: ['src/a.ts'],
    });

    write('src/a.ts', upsertHeader(body, sampleHeader({ reviewedByHuman: true }), ts));

    expect(ciDecision(await scanProject(tmpDir))).toEqual({ status: 'pass', unreviewedFiles: [] });
  });

  it('should apply extra exclusions', async () => {
    const report = await scanProject(tmpDir, { exclude: ['lib', 'README.md'] });
    expect(report.files.map((f) => f.path)).toEqual(['bad.ts', 'src/a.ts', 'src/b.ts']);
  });

  it('should leave out the listed files only', async () => {
    const report = await scanProject(tmpDir, {
      exclude: ['lib'],
      skipFiles: [path.join(tmpDir, 'src', 'b.ts'), path.join(tmpDir, 'README.md')],
    });
    expect(report.files.map((f) => f.path)).toEqual(['bad.ts', 'src/a.ts']);
  });

  it('should give the same report at any concurrency', async () => {
    const now = () => new Date('2026-01-02T03:04:05.000Z');
    const serial = await scanProject(tmpDir, { concurrency: 1, now });
    const parallel = await scanProject(tmpDir, { concurrency: 8, now });

    expect(parallel).toEqual(serial);
    expect(serial.generatedAt).toBe('2026-01-02T03:04:05.000Z');
  });

  it('should reject a missing root', async () => {
    await expect(scanProject(path.join(tmpDir, 'missing'))).rejects.toBeInstanceOf(ScanRootError);
  });

  it('should reject a root that is a file', async () => {
    await expect(scanProject(path.join(tmpDir, 'README.md'))).rejects.toThrow(
      'Scan root is not a directory',
    );
  });
});

describe('classifyText', () => {
  it('should keep parse diagnostics on the record', () => {
    const text = cBlock(
      headerContent('WHOLE CODE IN THIS FILE', 'NO', ['', 'METHOD(FUNCTIONS):', '- NOPE']),
    );

    const record = classifyText('x.ts', text, text.length, dialectFor('x.ts'));

    expect(record.classification).toBe('Unreviewed');
    expect(record.diagnostics).toHaveLength(1);
    expect(record.diagnostics[0]?.line).toBe(9);
  });
});

describe('countLines', () => {
  it('should count a final line without a terminator', () => {
    expect(countLines('')).toBe(0);
    expect(countLines('a')).toBe(1);
    expect(countLines('a\nb\n')).toBe(2);
    expect(countLines('a\r\nb')).toBe(2);
  });

  it('should count blank lines', () => {
    expect(countLines('a\n\n   \nb\n')).toBe(4);
  });
});
