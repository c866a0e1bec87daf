import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { RulesetError } from './errors.js';
import { DEFAULT_CONFIG } from './types.js';
import type { RuletreeConfig } from './types.js';

const CONFIG_DIR = join(homedir(), '.config', 'ruletree');
const CONFIG_FILE = 'config.json';

const configFileSchema = z.object({
  merge: z.boolean(),
  expandClauses: z.boolean(),
  rootName: z.string().min(1),
  format: z.enum(['json', 'text']),
  indent: z.number().int().min(0).max(10),
}).partial();

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(configDir: string = CONFIG_DIR): string {
  return join(configDir, CONFIG_FILE);
}

/**
 * Defaults, then the saved config file, then RULETREE_* environment
 * variables. CLI flags are applied on top by the caller.
 */
export function resolveConfig(configDir: string = CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): RuletreeConfig {
  const config: RuletreeConfig = { ...DEFAULT_CONFIG };

  Object.assign(config, readConfigFile(getConfigPath(configDir)));

  const merge = parseBoolean(env.RULETREE_MERGE);
  if (merge !== undefined) config.merge = merge;

  const expand = parseBoolean(env.RULETREE_EXPAND);
  if (expand !== undefined) config.expandClauses = expand;

  if (env.RULETREE_FORMAT === 'json' || env.RULETREE_FORMAT === 'text') {
    config.format = env.RULETREE_FORMAT;
  }

  return config;
}

/**
 * Merge `config` into the saved file. The merged settings are validated
 * before anything is written, and a bad saved value can be overwritten.
 */
export function saveConfig(config: Partial<RuletreeConfig>, configDir: string = CONFIG_DIR): void {
  const configPath = getConfigPath(configDir);
  const existing = existsSync(configPath) ? readJsonObject(configPath) : {};
  const toSave = validateSettings({ ...existing, ...config }, configPath);

  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }
  writeFileSync(configPath, JSON.stringify(toSave, null, 2), 'utf-8');
}

/**
 * Parse a `key=value` pair as given to `ruletree config --set`.
 */
export function parseSetting(pair: string): Partial<RuletreeConfig> {
  const eq = pair.indexOf('=');
  if (eq <= 0) {
    throw new RulesetError('INVALID_CONFIG', `Expected key=value, got "${pair}"`);
  }

  const key = pair.slice(0, eq);
  const value = pair.slice(eq + 1);

  switch (key) {
    case 'merge':
      return { merge: requireBoolean(key, value) };
    case 'expandClauses':
      return { expandClauses: requireBoolean(key, value) };
    case 'rootName':
      return { rootName: value };
    case 'format':
      if (value !== 'json' && value !== 'text') {
        throw new RulesetError('INVALID_CONFIG', `format must be json or text, got "${value}"`);
      }
      return { format: value };
    case 'indent':
      return { indent: Number(value) };
    default:
      throw new RulesetError('INVALID_CONFIG', `Unknown setting "${key}"`);
  }
}

/**
 * Read a yes/no setting. Returns undefined for anything it does not
 * recognise.
 */
export function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return undefined;
}

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

function requireBoolean(key: string, value: string): boolean {
  const flag = parseBoolean(value);
  if (flag === undefined) {
    throw new RulesetError('INVALID_CONFIG', `${key} must be true or false, got "${value}"`);
  }
  return flag;
}

function readConfigFile(configPath: string): Partial<RuletreeConfig> {
  if (!existsSync(configPath)) return {};
  return validateSettings(readJsonObject(configPath), configPath);
}

function readJsonObject(configPath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RulesetError('INVALID_CONFIG', `${configPath} is not valid JSON (${reason})`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new RulesetError('INVALID_CONFIG', `${configPath} must hold a JSON object`);
  }
  return { ...raw };
}

function validateSettings(settings: unknown, configPath: string): Partial<RuletreeConfig> {
  const parsed = configFileSchema.safeParse(settings);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new RulesetError('INVALID_CONFIG', `${configPath}: ${detail}`);
  }
  return parsed.data;
}
