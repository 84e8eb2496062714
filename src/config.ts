import os from 'os';
import path from 'path';
import { existsSync, readFileSync, readdirSync } from 'fs';
import { pathToFileURL } from 'url';
import { withConfigGlobals } from './actions.ts';
import { ConfigError } from './errors.ts';
import { resolvePath, type PathContext } from './paths.ts';
import type { Action, ActionType, LoadedConfig } from './types.ts';
import { statOrNull } from './utils/fs.ts';

export const CONFIG_DIRECTORY = path.join(os.homedir(), '.config', 'linkdots');

/** File inside a scripted config directory naming the dotfile repository */
export const REPO_FILE = 'dotfile_repo';

/** Module names tried, in order, inside a scripted config directory */
export const SCRIPT_NAMES = ['config.ts', 'config.mts', 'config.js', 'config.mjs'];

/**
 * Type tags accepted in config files. The JSON format uses the class-style
 * names; scripted configs may also use the internal tags the builders emit.
 */
const ACTION_TYPES: Record<string, ActionType> = {
  SymlinkAction: 'symlink',
  MkdirAction: 'mkdir',
  CopyAction: 'copy',
  CatAction: 'cat',
  symlink: 'symlink',
  mkdir: 'mkdir',
  copy: 'copy',
  cat: 'cat',
};

export interface ConfigPathOptions {
  baseDir?: string;
  profile?: string;
  config2?: boolean;
}

/** Where to load from: the config directory, or `profiles/<name>` under it. */
export function getConfigPath(opts: ConfigPathOptions = {}): string {
  let location = opts.baseDir ?? CONFIG_DIRECTORY;
  if (opts.profile) {
    location = path.join(location, 'profiles', opts.profile);
  }
  return opts.config2 ? location : path.join(location, 'config.json');
}

export interface LoadOptions extends PathContext {
  config2?: boolean;
}

export async function loadConfig(configPath: string, opts: LoadOptions = {}): Promise<LoadedConfig> {
  return opts.config2 ? loadScriptedConfig(configPath, opts) : loadJsonConfig(configPath, opts);
}

// ── JSON ──────────────────────────────────────────────────────────────

/**
 * Load a JSON config. `configPath` may be a file, or a directory whose
 * `*.json` files are merged in name order (later top-level keys win).
 * A relative `dotfile_repo` is taken relative to the config's directory.
 */
export function loadJsonConfig(configPath: string, ctx: PathContext = {}): LoadedConfig {
  const stats = statOrNull(configPath);
  if (!stats) {
    throw new ConfigError(`No config found at ${configPath}`);
  }

  let conf: Record<string, unknown>;
  let baseDir: string;
  if (stats.isDirectory()) {
    const files = readdirSync(configPath)
      .filter((name) => name.endsWith('.json'))
      .sort();
    if (files.length === 0) {
      throw new ConfigError(`No .json files in config directory ${configPath}`);
    }
    conf = files.reduce<Record<string, unknown>>(
      (merged, name) => ({ ...merged, ...readJsonObject(path.join(configPath, name)) }),
      {},
    );
    baseDir = configPath;
  } else {
    conf = readJsonObject(configPath);
    baseDir = path.dirname(configPath);
  }

  const repo = conf.dotfile_repo;
  if (typeof repo !== 'string' || repo.trim() === '') {
    throw new ConfigError('dotfile_repo must be a non-empty string');
  }

  return {
    dotfileRepo: resolvePath(repo, path.resolve(baseDir), ctx),
    actions: parseActions(conf.actions, 'actions'),
  };
}

function readJsonObject(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Cannot read ${file}: ${e instanceof Error ? e.message : e}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${file} must contain a JSON object`);
  }
  return parsed;
}

// ── Scripted ──────────────────────────────────────────────────────────

/**
 * Load a scripted config directory: `dotfile_repo` holds the repository path
 * on one line, and the first of {@link SCRIPT_NAMES} found exports `actions`.
 * The builders are globals while the module loads. The module only produces
 * descriptors; they are validated like JSON ones.
 */
export async function loadScriptedConfig(
  configDir: string,
  ctx: PathContext = {},
): Promise<LoadedConfig> {
  if (!statOrNull(configDir)?.isDirectory()) {
    throw new ConfigError(`Provided config directory ${configDir} is not a directory`);
  }
  const dir = path.resolve(configDir);

  const repoFile = path.join(dir, REPO_FILE);
  if (!existsSync(repoFile)) {
    throw new ConfigError(`Missing ${REPO_FILE} file in ${dir}`);
  }
  const repo = readFileSync(repoFile, 'utf-8').trimEnd();
  if (repo === '') {
    throw new ConfigError(`${repoFile} is empty`);
  }

  const script = SCRIPT_NAMES.map((name) => path.join(dir, name)).find((file) => existsSync(file));
  if (!script) {
    throw new ConfigError(`No config module (${SCRIPT_NAMES.join(', ')}) in ${dir}`);
  }

  let mod: unknown;
  try {
    mod = await withConfigGlobals<unknown>(() => import(pathToFileURL(script).href));
  } catch (e) {
    throw new ConfigError(`Failed to load ${script}: ${e instanceof Error ? e.message : e}`);
  }

  return {
    dotfileRepo: resolvePath(repo, dir, ctx),
    actions: parseActions(exportedActions(mod, script), 'actions'),
  };
}

function exportedActions(mod: unknown, script: string): unknown {
  if (isRecord(mod)) {
    if ('actions' in mod) return mod.actions;
    if (isRecord(mod.default) && 'actions' in mod.default) return mod.default.actions;
  }
  throw new ConfigError(`${script} does not export actions`);
}

// ── Validation ────────────────────────────────────────────────────────

export function parseActions(value: unknown, where: string): Action[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${where} must be an array`);
  }
  return value.map((item, i) => parseAction(item, `${where}[${i}]`));
}

/** Validate one descriptor in either the JSON (snake_case) or the builder shape. */
export function parseAction(value: unknown, where: string): Action {
  if (!isRecord(value)) {
    throw new ConfigError(`${where} must be an object`);
  }

  const tag = value.type;
  const type = typeof tag === 'string' ? ACTION_TYPES[tag] : undefined;
  switch (type) {
    case 'symlink':
      return {
        type,
        source: requireString(value, 'source', where),
        destination: requireString(value, 'destination', where),
        dirMode: optionalBoolean(value, ['dir_mode', 'dirMode'], where, false),
      };
    case 'mkdir':
      return {
        type,
        directory: requireString(value, 'directory', where),
        parents: optionalBoolean(value, ['parents'], where, true),
      };
    case 'copy':
      return {
        type,
        source: requireString(value, 'source', where),
        destination: requireString(value, 'destination', where),
        dirMode: optionalBoolean(value, ['dir_mode', 'dirMode'], where, false),
        overwrite: optionalBoolean(value, ['overwrite'], where, false),
      };
    case 'cat':
      return {
        type,
        destination: requireString(value, 'destination', where),
        sources: requireStringList(value, 'sources', where),
      };
    default:
      throw new ConfigError(`${where}.type: unknown action type ${JSON.stringify(tag)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function requireStringList(obj: Record<string, unknown>, key: string, where: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${where}.${key} must be a non-empty array of strings`);
  }
  return value.map((item, i) => {
    if (typeof item !== 'string' || item === '') {
      throw new ConfigError(`${where}.${key}[${i}] must be a non-empty string`);
    }
    return item;
  });
}

function optionalBoolean(
  obj: Record<string, unknown>,
  keys: string[],
  where: string,
  fallback: boolean,
): boolean {
  for (const key of keys) {
    const value = obj[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new ConfigError(`${where}.${key} must be a boolean`);
    }
    return value;
  }
  return fallback;
}
