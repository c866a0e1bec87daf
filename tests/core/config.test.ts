import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { getConfigPath, parseBoolean, parseSetting, resolveConfig, saveConfig } from '../../src/core/config.js';
import { RulesetError } from '../../src/core/errors.js';
import { DEFAULT_CONFIG } from '../../src/core/types.js';

describe('resolveConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ruletree-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', () => {
    expect(resolveConfig(dir, {})).toEqual(DEFAULT_CONFIG);
  });

  it('should read saved settings', () => {
    saveConfig({ merge: true, rootName: 'model' }, dir);

    const config = resolveConfig(dir, {});

    expect(config.merge).toBe(true);
    expect(config.rootName).toBe('model');
    expect(config.format).toBe('json');
  });

  it('should merge successive saves', () => {
    saveConfig({ merge: true }, dir);
    saveConfig({ indent: 4 }, dir);

    expect(JSON.parse(readFileSync(getConfigPath(dir), 'utf-8'))).toEqual({ merge: true, indent: 4 });
  });

  it('should let environment variables override the file', () => {
    saveConfig({ merge: true, expandClauses: false }, dir);

    const config = resolveConfig(dir, {
      RULETREE_MERGE: '0',
      RULETREE_EXPAND: 'yes',
      RULETREE_FORMAT: 'text',
    });

    expect(config.merge).toBe(false);
    expect(config.expandClauses).toBe(true);
    expect(config.format).toBe('text');
  });

  it('should ignore an unknown format in the environment', () => {
    expect(resolveConfig(dir, { RULETREE_FORMAT: 'xml' }).format).toBe('json');
  });

  it('should reject a config file that is not JSON', () => {
    writeFileSync(getConfigPath(dir), '{ merge: yes', 'utf-8');

    expect(() => resolveConfig(dir, {})).toThrow(RulesetError);
  });

  it('should reject settings of the wrong type', () => {
    writeFileSync(getConfigPath(dir), JSON.stringify({ indent: 'wide' }), 'utf-8');

    expect(() => resolveConfig(dir, {})).toThrow(/INVALID_CONFIG/);
  });
});

describe('saveConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ruletree-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should refuse an indent outside the allowed range', () => {
    expect(() => saveConfig({ indent: 50 }, dir)).toThrow(/INVALID_CONFIG/);
    expect(existsSync(getConfigPath(dir))).toBe(false);
  });

  it('should refuse an indent that is not a number', () => {
    saveConfig({ merge: true }, dir);

    expect(() => saveConfig({ indent: Number('abc') }, dir)).toThrow(/INVALID_CONFIG/);
    expect(JSON.parse(readFileSync(getConfigPath(dir), 'utf-8'))).toEqual({ merge: true });
    expect(resolveConfig(dir, {}).indent).toBe(2);
  });

  it('should overwrite a bad saved value', () => {
    writeFileSync(getConfigPath(dir), JSON.stringify({ indent: 50, rootName: 'model' }), 'utf-8');
    expect(() => resolveConfig(dir, {})).toThrow(/INVALID_CONFIG/);

    saveConfig({ indent: 4 }, dir);

    const config = resolveConfig(dir, {});
    expect(config.indent).toBe(4);
    expect(config.rootName).toBe('model');
  });

  it('should still reject a saved file that is not JSON', () => {
    writeFileSync(getConfigPath(dir), 'not json', 'utf-8');

    expect(() => saveConfig({ indent: 4 }, dir)).toThrow(/INVALID_CONFIG/);
  });
});

describe('parseBoolean', () => {
  it.each([
    ['1', true],
    ['true', true],
    ['YES', true],
    ['on', true],
    ['0', false],
    ['false', false],
    ['No', false],
    ['off', false],
  ])('should read %s as %s', (value, expected) => {
    expect(parseBoolean(value)).toBe(expected);
  });

  it('should return undefined for anything else', () => {
    expect(parseBoolean('maybe')).toBeUndefined();
    expect(parseBoolean('')).toBeUndefined();
    expect(parseBoolean(undefined)).toBeUndefined();
  });
});

describe('parseSetting', () => {
  it('should accept the same yes/no spellings as the environment', () => {
    expect(parseSetting('merge=yes')).toEqual({ merge: true });
    expect(parseSetting('merge=1')).toEqual({ merge: true });
    expect(parseSetting('expandClauses=off')).toEqual({ expandClauses: false });
  });

  it('should reject an unrecognised yes/no value', () => {
    expect(() => parseSetting('merge=maybe')).toThrow(/INVALID_CONFIG/);
  });

  it('should parse the remaining keys', () => {
    expect(parseSetting('rootName=model')).toEqual({ rootName: 'model' });
    expect(parseSetting('format=text')).toEqual({ format: 'text' });
    expect(parseSetting('indent=4')).toEqual({ indent: 4 });
  });

  it('should reject unknown keys and formats', () => {
    expect(() => parseSetting('colour=red')).toThrow(/Unknown setting "colour"/);
    expect(() => parseSetting('format=xml')).toThrow(/INVALID_CONFIG/);
    expect(() => parseSetting('merge')).toThrow(/Expected key=value/);
  });
});
