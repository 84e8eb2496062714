import type { CatAction, CopyAction, MkdirAction, SymlinkAction } from './types.ts';

/*
 * Builders for scripted configs. While a config module is being imported they
 * are also globals, so the module needs no import of its own:
 *
 *   export const actions = [
 *     mkdir('~/.config'),
 *     symlink({ source: 'nvim', destination: '~/.config/nvim' }),
 *   ];
 */

export interface SymlinkOptions {
  source: string;
  destination: string;
  dirMode?: boolean;
}

export function symlink(options: SymlinkOptions): SymlinkAction {
  return {
    type: 'symlink',
    source: options.source,
    destination: options.destination,
    dirMode: options.dirMode ?? false,
  };
}

export function mkdir(directory: string, options: { parents?: boolean } = {}): MkdirAction {
  return { type: 'mkdir', directory, parents: options.parents ?? true };
}

export interface CopyOptions {
  source: string;
  destination: string;
  dirMode?: boolean;
  overwrite?: boolean;
}

export function copy(options: CopyOptions): CopyAction {
  return {
    type: 'copy',
    source: options.source,
    destination: options.destination,
    dirMode: options.dirMode ?? false,
    overwrite: options.overwrite ?? false,
  };
}

export function cat(destination: string, ...sources: string[]): CatAction {
  return { type: 'cat', destination, sources };
}

/** Builders visible to a scripted config module without an import */
export const configGlobals = { symlink, mkdir, copy, cat };

/**
 * Run `load` with {@link configGlobals} defined on `globalThis`, restoring
 * whatever those names held before once it settles.
 */
export async function withConfigGlobals<T>(load: () => Promise<T>): Promise<T> {
  const previous = Object.keys(configGlobals).map(
    (name) => [name, Object.getOwnPropertyDescriptor(globalThis, name)] as const,
  );
  for (const [name, value] of Object.entries(configGlobals)) {
    Object.defineProperty(globalThis, name, { value, configurable: true, writable: true });
  }
  try {
    return await load();
  } finally {
    for (const [name, descriptor] of previous) {
      if (descriptor) {
        Object.defineProperty(globalThis, name, descriptor);
      } else {
        Reflect.deleteProperty(globalThis, name);
      }
    }
  }
}
