import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  loadConfig,
  writeDefaultConfig,
  generateDefaultConfig,
  getDefaultConfig,
  initConfig,
  getConfig,
  resetConfig,
} from './index';

const TEST_DIR = fileURLToPath(new URL('../../.test-config', import.meta.url));

function writeTestConfig(content: unknown, path?: string): string {
  const configPath = path ?? join(TEST_DIR, 'config.yaml');
  mkdirSync(join(configPath, '..'), { recursive: true });
  writeFileSync(configPath, typeof content === 'string' ? content : stringifyYaml(content), 'utf-8');
  return configPath;
}

beforeEach(() => {
  resetConfig();
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  resetConfig();
  initConfig(getDefaultConfig());
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
});

describe('loadConfig', () => {
  it('returns defaults when the file is missing', () => {
    expect(loadConfig(join(TEST_DIR, 'missing.yaml'))).toEqual({
      version: '1.0',
      jobs: { strictTransitions: true },
      exports: { defaultOrgUnit: '/Programs/Volunteers' },
    });
  });

  it('reads overrides and fills the rest from defaults', () => {
    const path = writeTestConfig({ version: '1.0', jobs: { strictTransitions: false } });

    expect(loadConfig(path)).toEqual({
      version: '1.0',
      jobs: { strictTransitions: false },
      exports: { defaultOrgUnit: '/Programs/Volunteers' },
    });
  });

  it('accepts a numeric version', () => {
    const path = writeTestConfig('version: 1\nexports:\n  defaultOrgUnit: /Cohorts\n');

    expect(loadConfig(path).exports.defaultOrgUnit).toBe('/Cohorts');
  });

  it('rejects an unsupported version', () => {
    const path = writeTestConfig({ version: '2.0' });

    expect(() => loadConfig(path)).toThrow("Unsupported config version: 2.0. Expected '1.0'.");
  });

  it('names the offending key', () => {
    const path = writeTestConfig({ version: '1.0', jobs: { strictTransitions: 'yes' } });

    expect(() => loadConfig(path)).toThrow(`Invalid config file at ${path}: jobs.strictTransitions: `);
  });

  it('rejects a file that is not a mapping', () => {
    const path = writeTestConfig('just a string\n');

    expect(() => loadConfig(path)).toThrow(`Invalid config file at ${path}: expected YAML object`);
  });
});

describe('default config file', () => {
  it('round-trips through loadConfig', () => {
    const path = join(TEST_DIR, 'nested', 'config.yaml');
    writeDefaultConfig(path);

    expect(loadConfig(path)).toEqual(getDefaultConfig());
  });

  it('starts with a comment header and parses as YAML', () => {
    const text = generateDefaultConfig();

    expect(text.startsWith('# Cohort Registry Configuration')).toBe(true);
    expect(parseYaml(text)).toEqual(getDefaultConfig());
  });

  it('is what writeDefaultConfig puts on disk', () => {
    const path = join(TEST_DIR, 'config.yaml');
    writeDefaultConfig(path);

    expect(readFileSync(path, 'utf-8')).toBe(generateDefaultConfig());
  });
});

describe('initConfig / getConfig', () => {
  it('uses an explicit config', () => {
    initConfig({ ...getDefaultConfig(), exports: { defaultOrgUnit: '/Elsewhere' } });

    expect(getConfig().exports.defaultOrgUnit).toBe('/Elsewhere');
  });

  it('hands out copies of the defaults', () => {
    const config = getDefaultConfig();
    config.jobs.strictTransitions = false;

    expect(getDefaultConfig().jobs.strictTransitions).toBe(true);
  });
});
