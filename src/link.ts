import path from 'path';
import { readlinkSync, renameSync, symlinkSync, unlinkSync, type Stats } from 'fs';
import {
  ConflictError,
  MissingParentError,
  PermissionError,
  SourceNotFoundError,
  errnoCode,
  isPermissionDenied,
} from './errors.ts';
import type { Logger } from './logger.ts';
import { canonicalPath } from './paths.ts';
import type { ConflictPolicy } from './types.ts';
import { describeKind, lstatOrNull, requireParentDirectory, statOrNull } from './utils/fs.ts';

export interface LinkOptions {
  conflictPolicy: ConflictPolicy;
  dryRun: boolean;
  logger: Logger;
}

export interface LinkResult {
  status: 'created' | 'replaced' | 'unchanged';
  reason?: string;
}

/** Absolute path a symlink points at, resolved against the link's own directory. */
export function readLinkTarget(link: string): string {
  return path.resolve(path.dirname(link), readlinkSync(link));
}

function linkType(source: string): 'dir' | 'file' {
  return statOrNull(source)?.isDirectory() ? 'dir' : 'file';
}

/**
 * Make `target` a symlink to `source`.
 *
 * An absent target gets a new link; `fs.symlink` refuses to overwrite, so a
 * target that appears concurrently is classified rather than clobbered. A
 * target already linked to `source` is left alone. A symlink pointing
 * elsewhere is a conflict unless the policy allows replacing symlinks, and any
 * other file or directory is always a conflict.
 *
 * Failures are thrown as {@link ActionError} subclasses.
 */
export function linkPath(source: string, target: string, options: LinkOptions): LinkResult {
  if (!statOrNull(source)) {
    throw new SourceNotFoundError(source);
  }

  const existing = lstatOrNull(target);
  if (!existing) {
    return createLink(source, target, options);
  }
  return resolveExisting(source, target, existing, options);
}

function resolveExisting(
  source: string,
  target: string,
  stats: Stats,
  options: LinkOptions,
): LinkResult {
  if (stats.isSymbolicLink()) {
    const current = readLinkTarget(target);
    if (canonicalPath(current) === canonicalPath(source)) {
      options.logger.debug(`${target} already links to ${source}`);
      return { status: 'unchanged', reason: 'already linked' };
    }
    if (options.conflictPolicy === 'replace-symlinks') {
      return replaceLink(source, target, current, options);
    }
    throw new ConflictError(`${target} is a symlink to ${current}`, target);
  }

  throw new ConflictError(
    `${target} already exists and is a ${describeKind(stats)}, not a symlink`,
    target,
  );
}

function createLink(source: string, target: string, options: LinkOptions): LinkResult {
  requireParentDirectory(target);
  if (options.dryRun) {
    return { status: 'created' };
  }

  try {
    symlinkSync(source, target, linkType(source));
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'EEXIST') {
      // Someone else created the target since we looked
      const raced = lstatOrNull(target);
      if (raced) {
        return resolveExisting(source, target, raced, { ...options, conflictPolicy: 'skip' });
      }
      throw new ConflictError(`${target} changed while it was being linked`, target);
    }
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new MissingParentError(path.dirname(target));
    }
    if (isPermissionDenied(err)) {
      throw new PermissionError(target, 'create a symlink at');
    }
    throw err;
  }

  options.logger.info(`Linked ${target} → ${source}`);
  return { status: 'created' };
}

/** Swap a foreign symlink for ours by renaming a staged link over it. */
function replaceLink(
  source: string,
  target: string,
  current: string,
  options: LinkOptions,
): LinkResult {
  const reason = `was linked to ${current}`;
  if (options.dryRun) {
    return { status: 'replaced', reason };
  }

  const staging = path.join(
    path.dirname(target),
    `.${path.basename(target)}.linkdots-${process.pid}`,
  );
  // A run that died mid-replace can leave its staged link behind
  if (lstatOrNull(staging)?.isSymbolicLink()) {
    unlinkSync(staging);
  }
  let staged = false;
  try {
    symlinkSync(source, staging, linkType(source));
    staged = true;
    // Only ever rename over a symlink, never over a file that appeared meanwhile
    if (!lstatOrNull(target)?.isSymbolicLink()) {
      throw new ConflictError(`${target} changed while it was being replaced`, target);
    }
    renameSync(staging, target);
    staged = false;
  } catch (err) {
    if (staged) {
      try {
        unlinkSync(staging);
      } catch (cleanupErr) {
        const message = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
        options.logger.warn(`Could not remove ${staging}: ${message}`);
      }
    }
    if (isPermissionDenied(err)) {
      throw new PermissionError(target, 'replace the symlink at');
    }
    throw err;
  }

  options.logger.info(`Relinked ${target} → ${source} (${reason})`);
  return { status: 'replaced', reason };
}
