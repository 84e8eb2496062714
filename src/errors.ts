import type { ErrorKind } from './types.ts';

/** A failure scoped to one link request or file operation. */
export abstract class ActionError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class SourceNotFoundError extends ActionError {
  readonly kind = 'SourceNotFoundError';

  constructor(path: string) {
    super(`source does not exist: ${path}`, path);
  }
}

export class NotADirectoryError extends ActionError {
  readonly kind = 'NotADirectoryError';

  constructor(path: string) {
    super(`not a directory: ${path}`, path);
  }
}

export class NotAFileError extends ActionError {
  readonly kind = 'NotAFileError';

  constructor(path: string) {
    super(`not a regular file: ${path}`, path);
  }
}

export class MissingParentError extends ActionError {
  readonly kind = 'MissingParentError';

  constructor(path: string) {
    super(`parent directory does not exist: ${path}`, path);
  }
}

export class ConflictError extends ActionError {
  readonly kind = 'ConflictError';
}

export class PermissionError extends ActionError {
  readonly kind = 'PermissionError';

  constructor(path: string, operation: string) {
    super(`permission denied while trying to ${operation} ${path}`, path);
  }
}

/** Thrown by the config loader; aborts the run before any action executes. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Narrow an unknown thrown value to a Node system error with an errno code. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isPermissionDenied(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'EACCES' || code === 'EPERM';
}
