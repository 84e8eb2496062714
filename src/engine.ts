import path from 'path';
import { readdirSync } from 'fs';
import {
  ActionError,
  ConflictError,
  NotADirectoryError,
  PermissionError,
  SourceNotFoundError,
  isPermissionDenied,
} from './errors.ts';
import { linkPath, type LinkOptions } from './link.ts';
import { silentLogger, type Logger } from './logger.ts';
import { concatenateFiles, copyFile, makeDirectory } from './operations.ts';
import { resolvePath, resolveRepoRoot, type PathContext } from './paths.ts';
import type {
  Action,
  ActionType,
  CatAction,
  ConflictPolicy,
  CopyAction,
  ExecutionEntry,
  ExecutionReport,
  MkdirAction,
  SymlinkAction,
} from './types.ts';
import { lstatOrNull, statOrNull } from './utils/fs.ts';

export interface RunOptions {
  /** What to do with a destination that is a symlink to something else. Default `'skip'`. */
  conflictPolicy?: ConflictPolicy;
  /** Classify every request without touching the filesystem */
  dryRun?: boolean;
  /** Replaces `os.homedir()` when expanding `~` */
  homeDir?: string;
  /** Replaces `process.env` when expanding `$VAR` */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

interface Context extends LinkOptions {
  root: string;
  paths: PathContext;
}

type Outcome = {
  status: 'created' | 'replaced' | 'unchanged' | 'skipped';
  target?: string;
  reason?: string;
};

/**
 * Execute `actions` in order against the dotfile repository at `repoRoot`.
 *
 * Every link request is attempted; a failure is recorded in the report and
 * the run moves on to the next request.
 */
export function runActions(
  actions: readonly Action[],
  repoRoot: string,
  options: RunOptions = {},
): ExecutionReport {
  const paths: PathContext = { homeDir: options.homeDir, env: options.env };
  const ctx: Context = {
    root: resolveRepoRoot(repoRoot, paths),
    paths,
    conflictPolicy: options.conflictPolicy ?? 'skip',
    dryRun: options.dryRun ?? false,
    logger: options.logger ?? silentLogger,
  };

  const entries: ExecutionEntry[] = [];
  for (const action of actions) {
    ctx.logger.debug(`Exec ${describeAction(action)}`);
    entries.push(...executeAction(action, ctx));
  }
  return { entries };
}

function executeAction(action: Action, ctx: Context): ExecutionEntry[] {
  switch (action.type) {
    case 'symlink':
      return executeSymlink(action, ctx);
    case 'mkdir':
      return executeMkdir(action, ctx);
    case 'copy':
      return executeCopy(action, ctx);
    case 'cat':
      return executeCat(action, ctx);
    default:
      return assertNever(action);
  }
}

function assertNever(action: never): never {
  throw new Error(`Unhandled action: ${JSON.stringify(action)}`);
}

function executeSymlink(action: SymlinkAction, ctx: Context): ExecutionEntry[] {
  const source = resolvePath(action.source, ctx.root, ctx.paths);
  const destination = resolvePath(action.destination, ctx.root, ctx.paths);

  if (!action.dirMode) {
    return [attempt('symlink', source, destination, ctx, () => linkPath(source, destination, ctx))];
  }

  let children: string[];
  try {
    children = listChildren(source);
  } catch (err) {
    return [failure('symlink', source, destination, err, ctx)];
  }

  return children.map((name) => {
    const childSource = path.join(source, name);
    const childTarget = path.join(destination, name);
    return attempt('symlink', childSource, childTarget, ctx, () =>
      linkPath(childSource, childTarget, ctx),
    );
  });
}

function executeMkdir(action: MkdirAction, ctx: Context): ExecutionEntry[] {
  const directory = resolvePath(action.directory, ctx.root, ctx.paths);
  return [
    attempt('mkdir', undefined, directory, ctx, () =>
      makeDirectory(directory, action.parents, ctx),
    ),
  ];
}

function executeCopy(action: CopyAction, ctx: Context): ExecutionEntry[] {
  const source = resolvePath(action.source, ctx.root, ctx.paths);
  const destination = resolvePath(action.destination, ctx.root, ctx.paths);

  if (!action.dirMode) {
    return [
      attempt('copy', source, destination, ctx, () =>
        copyFile(source, destination, action.overwrite, ctx),
      ),
    ];
  }

  let children: string[];
  try {
    children = listChildren(source);
    if (!lstatOrNull(destination)?.isDirectory()) {
      throw new NotADirectoryError(destination);
    }
  } catch (err) {
    return [failure('copy', source, destination, err, ctx)];
  }

  return children.map((name): ExecutionEntry => {
    const childSource = path.join(source, name);
    const childTarget = path.join(destination, name);
    if (statOrNull(childSource)?.isDirectory()) {
      ctx.logger.debug(`Skipping directory ${childSource}`);
      return {
        action: 'copy',
        source: childSource,
        target: childTarget,
        status: 'skipped',
        reason: 'directory, only files are copied',
      };
    }
    return attempt('copy', childSource, childTarget, ctx, () =>
      copyFile(childSource, destination, action.overwrite, ctx),
    );
  });
}

function executeCat(action: CatAction, ctx: Context): ExecutionEntry[] {
  const sources = action.sources.map((source) => resolvePath(source, ctx.root, ctx.paths));
  const destination = resolvePath(action.destination, ctx.root, ctx.paths);
  return [
    attempt('cat', sources.join(', '), destination, ctx, () =>
      concatenateFiles(sources, destination, ctx),
    ),
  ];
}

/** Direct children of a directory, sorted so runs are reproducible. */
function listChildren(directory: string): string[] {
  const stats = statOrNull(directory);
  if (!stats) throw new SourceNotFoundError(directory);
  if (!stats.isDirectory()) throw new NotADirectoryError(directory);
  try {
    return readdirSync(directory).sort();
  } catch (err) {
    if (isPermissionDenied(err)) throw new PermissionError(directory, 'list');
    throw err;
  }
}

function attempt(
  action: ActionType,
  source: string | undefined,
  target: string,
  ctx: Context,
  run: () => Outcome,
): ExecutionEntry {
  try {
    const outcome = run();
    return {
      action,
      source,
      target: outcome.target ?? target,
      status: outcome.status,
      reason: outcome.reason,
    };
  } catch (err) {
    return failure(action, source, target, err, ctx);
  }
}

function failure(
  action: ActionType,
  source: string | undefined,
  target: string,
  err: unknown,
  ctx: Context,
): ExecutionEntry {
  if (err instanceof ConflictError) {
    ctx.logger.warn(`Conflict: ${err.message}`);
    return { action, source, target, status: 'conflict', reason: err.message, error: err.kind };
  }
  if (err instanceof ActionError) {
    ctx.logger.error(err.message);
    return { action, source, target, status: 'error', reason: err.message, error: err.kind };
  }
  const message = err instanceof Error ? err.message : String(err);
  ctx.logger.error(`Unexpected failure on ${target}: ${message}`);
  return { action, source, target, status: 'error', reason: message, error: 'UnexpectedError' };
}

export function describeAction(action: Action): string {
  switch (action.type) {
    case 'symlink':
      return `symlink(source=${action.source}, destination=${action.destination}, dirMode=${action.dirMode})`;
    case 'mkdir':
      return `mkdir(directory=${action.directory}, parents=${action.parents})`;
    case 'copy':
      return `copy(source=${action.source}, destination=${action.destination}, dirMode=${action.dirMode}, overwrite=${action.overwrite})`;
    case 'cat':
      return `cat(destination=${action.destination}, sources=${action.sources.join(', ')})`;
    default:
      return assertNever(action);
  }
}
