import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  CONFIG_FILE_NAME,
  ConfigError,
  findConfigFile,
  loadConfig,
  loadConfigFromString,
  resolveConfig,
} from '../utils/config.js';

describe('loadConfigFromString', () => {
  it('should load a full config', () => {
    const result = loadConfigFromString(
      [
        'exclude: [generated, fixtures]',
        'dialects:',
        '  .vue: { language: Vue, style: html }',
        'protocolPath: docs/AIGCAP_PROTOCOL.md',
        'output: reports/coverage.html',
        'concurrency: 4',
      ].join('\n'),
      {},
    );

    expect(result).toEqual({
      success: true,
      source: null,
      config: {
        exclude: ['generated', 'fixtures'],
        dialects: { '.vue': { language: 'Vue', style: 'html' } },
        protocolPath: 'docs/AIGCAP_PROTOCOL.md',
        output: 'reports/coverage.html',
        concurrency: 4,
      },
    });
  });

  it('should return defaults for an empty document', () => {
    expect(loadConfigFromString('', {})).toEqual({
      success: true,
      source: null,
      config: { exclude: [], dialects: {} },
    });
  });

  it('should report field errors', () => {
    const result = loadConfigFromString('exclude: generated\nconcurrency: 0\n', {});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.field)).toEqual(['exclude', 'concurrency']);
    }
  });

  it('should reject an unknown comment style', () => {
    const result = loadConfigFromString('dialects:\n  .vue: { language: Vue, style: curly }\n', {});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.field)).toEqual(['dialects..vue.style']);
    }
  });

  it('should reject unknown keys', () => {
    const result = loadConfigFromString('exclud: [dist]\n', {});

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((e) => e.field)).toEqual(['config']);
    }
  });

  it('should reject invalid YAML and non-mappings', () => {
    const broken = loadConfigFromString('exclude: [a\n', {});
    const list = loadConfigFromString('- a\n- b\n', {});

    expect(broken.success).toBe(false);
    if (!broken.success) {
      expect(broken.errors[0]?.field).toBe('yaml');
    }
    expect(list).toEqual({
      success: false,
      errors: [{ field: 'yaml', message: 'Config must be a YAML mapping' }],
    });
  });

  it('should apply environment overrides', () => {
    const result = loadConfigFromString('exclude: [generated]\nprotocolPath: a.md\n', {
      AIGCAP_EXCLUDE: 'tmp, out',
      AIGCAP_PROTOCOL_PATH: '/etc/aigcap/PROTOCOL.md',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.config.exclude).toEqual(['generated', 'tmp', 'out']);
      expect(result.config.protocolPath).toBe('/etc/aigcap/PROTOCOL.md');
    }
  });
});

describe('loadConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'aigcap-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should find the config file in a parent directory', () => {
    const configPath = path.join(tmpDir, CONFIG_FILE_NAME);
    fs.writeFileSync(configPath, 'exclude: [generated]\n');
    const nested = path.join(tmpDir, 'src', 'deep');
    fs.mkdirSync(nested, { recursive: true });

    expect(findConfigFile(nested)).toBe(configPath);
    expect(loadConfig({ cwd: nested, env: {} })).toEqual({
      success: true,
      source: configPath,
      config: { exclude: ['generated'], dialects: {} },
    });
  });

  it('should load an explicit config path relative to cwd', () => {
    fs.writeFileSync(path.join(tmpDir, 'ci.yaml'), 'concurrency: 2\n');

    const result = loadConfig({ cwd: tmpDir, configPath: 'ci.yaml', env: {} });

    expect(result.success && result.config.concurrency).toBe(2);
  });

  it('should fail when an explicit config file is missing', () => {
    const result = loadConfig({ cwd: tmpDir, configPath: 'missing.yaml', env: {} });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors[0]?.field).toBe('configPath');
    }
  });

  it('should throw ConfigError from resolveConfig', () => {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), 'output: 12\n');

    expect(() => resolveConfig({ cwd: tmpDir, env: {} })).toThrow(ConfigError);
    expect(() => resolveConfig({ cwd: tmpDir, env: {} })).toThrow(/^Invalid configuration: output: /);
  });
});
