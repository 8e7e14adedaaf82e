import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  ConfigError,
  DEFAULT_COERCION,
  configFromEnv,
  expandEnvVars,
  loadAccessorConfig,
  parseAccessorConfig,
  resolveCoercionOptions,
} from '../src/index.js';

describe('accessor configuration', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('parses a complete configuration', () => {
    const config = parseAccessorConfig({
      coercion: { numericStrings: false },
      logging: { level: 'debug', format: 'json' },
    });

    expect(config).toEqual({
      coercion: { numericStrings: false },
      logging: { level: 'debug', format: 'json' },
    });
  });

  it('expands environment placeholders with defaults', () => {
    const raw = { logging: { level: '${LOG_LEVEL:-info}' } };

    expect(parseAccessorConfig(raw, {}).logging?.level).toBe('info');
    expect(parseAccessorConfig(raw, { LOG_LEVEL: 'error' }).logging?.level).toBe('error');
  });

  it('turns expanded flag strings into booleans', () => {
    const config = parseAccessorConfig({ coercion: { dateStrings: '${DATES:-false}' } }, {});

    expect(config.coercion?.dateStrings).toBe(false);
  });

  it('expands nested values and fails on a missing variable', () => {
    expect(() => parseAccessorConfig({ logging: { level: '${NOPE}' } }, {})).toThrowError(
      'Missing required environment variable: NOPE'
    );
    expect(expandEnvVars(['${DIR:-/tmp}', 3, { mode: '${MODE}' }], { MODE: 'fast' })).toEqual([
      '/tmp',
      3,
      { mode: 'fast' },
    ]);
  });

  it('lists invalid entries', () => {
    expect(() => parseAccessorConfig({ logging: { level: 'verbose' } })).toThrowError(ConfigError);
    expect(() => parseAccessorConfig({ logging: { level: 'verbose' } })).toThrowError(
      /^Invalid accessor config:\n- logging\.level: /
    );
    expect(() => parseAccessorConfig({ caching: true })).toThrowError(ConfigError);
  });

  it('defaults every coercion switch to on', () => {
    expect(resolveCoercionOptions({})).toEqual(DEFAULT_COERCION);
    expect(resolveCoercionOptions({ coercion: { booleanStrings: false } })).toEqual({
      numericStrings: true,
      booleanStrings: false,
      dateStrings: true,
    });
  });

  it('reads RECORDKIT_* variables', () => {
    const config = configFromEnv({
      RECORDKIT_LOG_LEVEL: ' DEBUG ',
      RECORDKIT_COERCE_NUMERIC_STRINGS: 'false',
    });

    expect(config.logging?.level).toBe('debug');
    expect(config.logging?.format).toBeUndefined();
    expect(resolveCoercionOptions(config)).toEqual({
      numericStrings: false,
      booleanStrings: true,
      dateStrings: true,
    });
  });

  it('loads a JSON file with a byte order mark', async () => {
    dir = mkdtempSync(join(tmpdir(), 'recordkit-config-'));
    const configPath = join(dir, 'accessor.json');
    writeFileSync(configPath, '\uFEFF{"logging":{"format":"json"}}', 'utf-8');

    const config = await loadAccessorConfig(configPath);

    expect(config.logging?.format).toBe('json');
  });

  it('rejects a file that is not JSON', async () => {
    dir = mkdtempSync(join(tmpdir(), 'recordkit-config-'));
    const configPath = join(dir, 'accessor.json');
    writeFileSync(configPath, '{ logging: ', 'utf-8');

    await expect(loadAccessorConfig(configPath)).rejects.toThrowError(ConfigError);
    await expect(loadAccessorConfig(configPath)).rejects.toThrowError(`Invalid JSON in ${configPath}`);
  });
});
