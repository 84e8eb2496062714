import os from 'os';
import path from 'path';
import { existsSync, realpathSync } from 'fs';

export type PathContext = {
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Replace `$NAME` and `${NAME}` with values from the environment.
 * Unset variables are left in place.
 */
export function expandVars(input: string, env: NodeJS.ProcessEnv = process.env): string {
  return input.replace(/\$(\w+)|\$\{(\w+)\}/g, (match, bare?: string, braced?: string) => {
    const name = bare ?? braced;
    if (!name) return match;
    const value = env[name];
    return value === undefined ? match : value;
  });
}

/** Expand a leading `~` or `~/` to the home directory. `~user` is left alone. */
export function expandHome(input: string, homeDir: string = os.homedir()): string {
  if (input === '~') return homeDir;
  if (input.startsWith('~/')) return path.join(homeDir, input.slice(2));
  return input;
}

/** Expand variables and `~`, then resolve against `base` if still relative. */
export function resolvePath(input: string, base: string, ctx: PathContext = {}): string {
  const expanded = expandHome(expandVars(input, ctx.env), ctx.homeDir);
  return path.resolve(base, expanded);
}

/**
 * Resolve the dotfile repository root once per run.
 * Existing paths are canonicalised so link targets compare reliably.
 */
export function resolveRepoRoot(repo: string, ctx: PathContext = {}): string {
  const resolved = resolvePath(repo, process.cwd(), ctx);
  return existsSync(resolved) ? realpathSync(resolved) : resolved;
}

/** Canonical form of a path: realpath when it exists, a normalised absolute path otherwise. */
export function canonicalPath(p: string): string {
  try {
    return realpathSync(p);
  } catch {
    return path.resolve(p);
  }
}
