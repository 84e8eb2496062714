import path from 'path';
import { constants, copyFileSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import {
  ConflictError,
  MissingParentError,
  NotAFileError,
  PermissionError,
  SourceNotFoundError,
  errnoCode,
  isPermissionDenied,
} from './errors.ts';
import { readLinkTarget } from './link.ts';
import type { Logger } from './logger.ts';
import { describeKind, lstatOrNull, requireParentDirectory, statOrNull } from './utils/fs.ts';

export interface OperationOptions {
  dryRun: boolean;
  logger: Logger;
}

export interface OperationResult {
  status: 'created' | 'replaced' | 'unchanged' | 'skipped';
  /** Path actually written, which for a copy into a directory differs from the requested one */
  target: string;
  reason?: string;
}

export function makeDirectory(
  directory: string,
  parents: boolean,
  options: OperationOptions,
): OperationResult {
  const existing = statOrNull(directory);
  if (existing) {
    if (existing.isDirectory()) {
      return { status: 'unchanged', target: directory, reason: 'already exists' };
    }
    throw new ConflictError(
      `${directory} already exists and is a ${describeKind(existing)}`,
      directory,
    );
  }
  if (!parents) requireParentDirectory(directory);
  if (options.dryRun) return { status: 'created', target: directory };

  try {
    mkdirSync(directory, { recursive: parents });
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new MissingParentError(path.dirname(directory));
    }
    if (isPermissionDenied(err)) throw new PermissionError(directory, 'create');
    throw err;
  }
  options.logger.info(`Created directory ${directory}`);
  return { status: 'created', target: directory };
}

/** Writing through a link would modify whatever it points at, often the repository itself. */
function refuseSymlink(target: string): ConflictError {
  return new ConflictError(
    `${target} is a symlink to ${readLinkTarget(target)}, not writing through it`,
    target,
  );
}

/**
 * Copy a single file. When `destination` is a real directory the file lands inside
 * it under its own name. An existing file is only replaced with `overwrite`.
 */
export function copyFile(
  source: string,
  destination: string,
  overwrite: boolean,
  options: OperationOptions,
): OperationResult {
  const sourceStats = statOrNull(source);
  if (!sourceStats) throw new SourceNotFoundError(source);
  if (!sourceStats.isFile()) throw new NotAFileError(source);

  // A symlinked directory is not copied into: it would write inside whatever it points at
  const target = lstatOrNull(destination)?.isDirectory()
    ? path.join(destination, path.basename(source))
    : destination;

  const existing = lstatOrNull(target);
  if (existing?.isSymbolicLink()) {
    throw refuseSymlink(target);
  }
  if (existing?.isDirectory()) {
    throw new ConflictError(`${target} already exists and is a directory`, target);
  }
  if (existing && !overwrite) {
    options.logger.warn(`Skipping ${source}: ${target} exists and overwrite is off`);
    return { status: 'skipped', target, reason: 'exists, overwrite is off' };
  }
  if (!existing) requireParentDirectory(target);

  const status = existing ? 'replaced' : 'created';
  if (options.dryRun) return { status, target };

  try {
    copyFileSync(source, target, overwrite ? 0 : constants.COPYFILE_EXCL);
  } catch (err) {
    if (errnoCode(err) === 'EEXIST') {
      return { status: 'skipped', target, reason: 'exists, overwrite is off' };
    }
    if (isPermissionDenied(err)) throw new PermissionError(target, 'write');
    throw err;
  }
  options.logger.info(`Copied ${source} to ${target}`);
  return { status, target };
}

/** Concatenate `sources` in order into `destination`, replacing its contents. */
export function concatenateFiles(
  sources: string[],
  destination: string,
  options: OperationOptions,
): OperationResult {
  for (const source of sources) {
    const stats = statOrNull(source);
    if (!stats) throw new SourceNotFoundError(source);
    if (!stats.isFile()) throw new NotAFileError(source);
  }

  const existing = lstatOrNull(destination);
  if (existing?.isSymbolicLink()) {
    throw refuseSymlink(destination);
  }
  if (existing && !existing.isFile()) {
    throw new ConflictError(
      `${destination} already exists and is a ${describeKind(existing)}`,
      destination,
    );
  }
  if (!existing) requireParentDirectory(destination);

  const status = existing ? 'replaced' : 'created';
  if (options.dryRun) return { status, target: destination };

  try {
    const content = Buffer.concat(sources.map((source) => readFileSync(source)));
    writeFileSync(destination, content);
  } catch (err) {
    if (isPermissionDenied(err)) throw new PermissionError(destination, 'write');
    throw err;
  }
  options.logger.info(`Wrote ${destination} from ${sources.length} file(s)`);
  return { status, target: destination };
}
