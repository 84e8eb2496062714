import path from 'path';
import { lstatSync, statSync, type Stats } from 'fs';
import {
  MissingParentError,
  PermissionError,
  errnoCode,
  isPermissionDenied,
} from '../errors.ts';

function isAbsent(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/** lstat without following links; `null` when nothing is there. */
export function lstatOrNull(p: string): Stats | null {
  try {
    return lstatSync(p);
  } catch (err) {
    if (isAbsent(err)) return null;
    if (isPermissionDenied(err)) throw new PermissionError(p, 'inspect');
    throw err;
  }
}

/** stat following links; `null` when the path (or its link target) is missing. */
export function statOrNull(p: string): Stats | null {
  try {
    return statSync(p);
  } catch (err) {
    if (isAbsent(err)) return null;
    if (isPermissionDenied(err)) throw new PermissionError(p, 'inspect');
    throw err;
  }
}

export function describeKind(stats: Stats): string {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'special file';
}

/** The parent of `target` must already be a directory; nothing is created here. */
export function requireParentDirectory(target: string): void {
  const parent = path.dirname(target);
  if (!statOrNull(parent)?.isDirectory()) {
    throw new MissingParentError(parent);
  }
}
