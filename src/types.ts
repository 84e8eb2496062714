export type ActionType = 'symlink' | 'mkdir' | 'copy' | 'cat';

/** Link `source` (relative to the dotfile repo) to `destination`. */
export interface SymlinkAction {
  type: 'symlink';
  source: string;
  destination: string;
  /** Link each direct child of `source` into `destination` instead */
  dirMode: boolean;
}

export interface MkdirAction {
  type: 'mkdir';
  directory: string;
  parents: boolean;
}

export interface CopyAction {
  type: 'copy';
  source: string;
  destination: string;
  dirMode: boolean;
  overwrite: boolean;
}

export interface CatAction {
  type: 'cat';
  destination: string;
  sources: string[];
}

export type Action = SymlinkAction | MkdirAction | CopyAction | CatAction;

export type ConflictPolicy = 'skip' | 'replace-symlinks';

export type EntryStatus =
  | 'created'
  | 'replaced'
  | 'unchanged'
  | 'skipped'
  | 'conflict'
  | 'error';

export type ErrorKind =
  | 'SourceNotFoundError'
  | 'NotADirectoryError'
  | 'NotAFileError'
  | 'MissingParentError'
  | 'ConflictError'
  | 'PermissionError'
  | 'UnexpectedError';

export interface ExecutionEntry {
  action: ActionType;
  source?: string;
  target: string;
  status: EntryStatus;
  reason?: string;
  error?: ErrorKind;
}

export interface ExecutionReport {
  entries: ExecutionEntry[];
}

export interface LoadedConfig {
  /** Absolute path of the dotfile repository */
  dotfileRepo: string;
  actions: Action[];
}
