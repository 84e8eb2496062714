import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  chmodSync,
  existsSync,
  lstatSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  readlinkSync,
  realpathSync,
  rmSync,
  writeFileSync,
} from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { runActions, describeAction } from '../src/engine.ts';
import { cat, copy, mkdir, symlink } from '../src/actions.ts';
import { ConsoleLogger } from '../src/logger.ts';
import { reportSucceeded } from '../src/report.ts';

describe('runActions', () => {
  let root: string;
  let repo: string;
  let home: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'linkdots-engine-')));
    repo = join(root, 'repo');
    home = join(root, 'home', 'u');
    mkdirSync(repo, { recursive: true });
    mkdirSync(home, { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should link a directory as a whole when dirMode is off', () => {
    mkdirSync(join(repo, 'app'));
    mkdirSync(join(home, '.config'));
    const destination = join(home, '.config', 'app');

    const report = runActions([symlink({ source: 'app', destination })], repo);

    expect(report.entries).toEqual([
      {
        action: 'symlink',
        source: join(repo, 'app'),
        target: destination,
        status: 'created',
        reason: undefined,
      },
    ]);
    expect(readlinkSync(destination)).toBe(join(repo, 'app'));
  });

  it('should link each direct child when dirMode is on', () => {
    mkdirSync(join(repo, 'main'));
    writeFileSync(join(repo, 'main', 'a'), 'a');
    writeFileSync(join(repo, 'main', 'b'), 'b');

    const report = runActions(
      [symlink({ source: 'main', destination: home, dirMode: true })],
      repo,
    );

    expect(report.entries.map((e) => e.status)).toEqual(['created', 'created']);
    expect(readlinkSync(join(home, 'a'))).toBe(join(repo, 'main', 'a'));
    expect(readlinkSync(join(home, 'b'))).toBe(join(repo, 'main', 'b'));
    expect(lstatSync(home).isSymbolicLink()).toBe(false);
  });

  it('should not recurse into grandchildren in dirMode', () => {
    mkdirSync(join(repo, 'main', 'nested'), { recursive: true });
    writeFileSync(join(repo, 'main', 'a'), 'a');
    writeFileSync(join(repo, 'main', 'nested', 'deep'), 'deep');

    const report = runActions(
      [symlink({ source: 'main', destination: home, dirMode: true })],
      repo,
    );

    expect(report.entries.map((e) => e.target)).toEqual([join(home, 'a'), join(home, 'nested')]);
    expect(lstatSync(join(home, 'nested')).isSymbolicLink()).toBe(true);
    expect(existsSync(join(home, 'deep'))).toBe(false);
  });

  it('should expand dirMode children in sorted order', () => {
    mkdirSync(join(repo, 'main'));
    for (const name of ['c', 'a', 'b']) writeFileSync(join(repo, 'main', name), name);

    const report = runActions(
      [symlink({ source: 'main', destination: home, dirMode: true })],
      repo,
    );

    expect(report.entries.map((e) => e.target)).toEqual([
      join(home, 'a'),
      join(home, 'b'),
      join(home, 'c'),
    ]);
  });

  it('should be idempotent across runs', () => {
    mkdirSync(join(repo, 'main'));
    writeFileSync(join(repo, 'main', 'a'), 'a');
    writeFileSync(join(repo, 'zshrc'), 'export A=1');
    const actions = [
      symlink({ source: 'main', destination: home, dirMode: true }),
      symlink({ source: 'zshrc', destination: join(home, '.zshrc') }),
    ];

    const first = runActions(actions, repo);
    const stateAfterFirst = readdirSync(home).sort();
    const second = runActions(actions, repo);

    expect(first.entries.map((e) => e.status)).toEqual(['created', 'created']);
    expect(second.entries.map((e) => e.status)).toEqual(['unchanged', 'unchanged']);
    expect(second.entries.map((e) => e.reason)).toEqual(['already linked', 'already linked']);
    expect(readdirSync(home).sort()).toEqual(stateAfterFirst);
    expect(readlinkSync(join(home, '.zshrc'))).toBe(join(repo, 'zshrc'));
  });

  it('should report a ConflictError for a plain file and leave it unmodified', () => {
    writeFileSync(join(repo, 'bashrc'), 'from repo');
    writeFileSync(join(home, '.bashrc'), 'local');

    const report = runActions(
      [symlink({ source: 'bashrc', destination: join(home, '.bashrc') })],
      repo,
    );

    expect(report.entries).toHaveLength(1);
    expect(report.entries[0].status).toBe('conflict');
    expect(report.entries[0].error).toBe('ConflictError');
    expect(readFileSync(join(home, '.bashrc'), 'utf-8')).toBe('local');
    expect(reportSucceeded(report)).toBe(false);
  });

  it('should report a missing source and keep going', () => {
    writeFileSync(join(repo, 'gitconfig'), '[user]');

    const report = runActions(
      [
        symlink({ source: 'missing', destination: join(home, '.missing') }),
        symlink({ source: 'gitconfig', destination: join(home, '.gitconfig') }),
      ],
      repo,
    );

    expect(report.entries.map((e) => [e.status, e.error])).toEqual([
      ['error', 'SourceNotFoundError'],
      ['created', undefined],
    ]);
    expect(existsSync(join(home, '.missing'))).toBe(false);
    expect(lstatSync(join(home, '.gitconfig')).isSymbolicLink()).toBe(true);
  });

  it('should report NotADirectoryError when dirMode names a file', () => {
    writeFileSync(join(repo, 'vimrc'), '');

    const report = runActions(
      [symlink({ source: 'vimrc', destination: home, dirMode: true })],
      repo,
    );

    expect(report.entries).toHaveLength(1);
    expect(report.entries[0].error).toBe('NotADirectoryError');
    expect(report.entries[0].target).toBe(home);
  });

  it('should report MissingParentError instead of creating parents', () => {
    writeFileSync(join(repo, 'init.lua'), '');
    const destination = join(home, '.config', 'nvim', 'init.lua');

    const report = runActions([symlink({ source: 'init.lua', destination })], repo);

    expect(report.entries[0].error).toBe('MissingParentError');
    expect(report.entries[0].reason).toBe(
      `parent directory does not exist: ${join(home, '.config', 'nvim')}`,
    );
    expect(existsSync(join(home, '.config'))).toBe(false);
  });

  it('should expand ~ in destinations and in the repository root', () => {
    writeFileSync(join(repo, 'vimrc'), '');

    const report = runActions(
      [symlink({ source: 'vimrc', destination: '~/.vimrc' })],
      '~/../../repo',
      { homeDir: home },
    );

    expect(report.entries[0].status).toBe('created');
    expect(readlinkSync(join(home, '.vimrc'))).toBe(join(repo, 'vimrc'));
  });

  it('should expand environment variables in destinations', () => {
    writeFileSync(join(repo, 'starship.toml'), '');
    mkdirSync(join(home, '.config'));

    runActions(
      [symlink({ source: 'starship.toml', destination: '${XDG_CONFIG_HOME}/starship.toml' })],
      repo,
      { env: { XDG_CONFIG_HOME: join(home, '.config') } },
    );

    expect(readlinkSync(join(home, '.config', 'starship.toml'))).toBe(join(repo, 'starship.toml'));
  });

  it('should resolve a relative destination against the repository', () => {
    writeFileSync(join(repo, 'vimrc'), '');
    mkdirSync(join(repo, 'out'));

    runActions([symlink({ source: 'vimrc', destination: 'out/vimrc' })], repo);

    expect(readlinkSync(join(repo, 'out', 'vimrc'))).toBe(join(repo, 'vimrc'));
  });

  it('should classify without changing anything in dry-run mode', () => {
    mkdirSync(join(repo, 'main'));
    writeFileSync(join(repo, 'main', 'a'), 'a');
    writeFileSync(join(home, 'a'), 'local');
    writeFileSync(join(repo, 'main', 'b'), 'b');

    const report = runActions(
      [symlink({ source: 'main', destination: home, dirMode: true })],
      repo,
      { dryRun: true },
    );

    expect(report.entries.map((e) => e.status)).toEqual(['conflict', 'created']);
    expect(readdirSync(home)).toEqual(['a']);
  });

  it('should run actions in list order', () => {
    writeFileSync(join(repo, 'init.lua'), '');

    const report = runActions(
      [
        mkdir('~/.config/nvim'),
        symlink({ source: 'init.lua', destination: '~/.config/nvim/init.lua' }),
      ],
      repo,
      { homeDir: home },
    );

    expect(report.entries.map((e) => [e.action, e.status])).toEqual([
      ['mkdir', 'created'],
      ['symlink', 'created'],
    ]);
    expect(reportSucceeded(report)).toBe(true);
  });

  it('should copy files from a directory, skipping subdirectories', () => {
    mkdirSync(join(repo, 'bin', 'lib'), { recursive: true });
    writeFileSync(join(repo, 'bin', 'x'), 'x');
    writeFileSync(join(repo, 'bin', 'y'), 'y');
    mkdirSync(join(home, 'bin'));

    const report = runActions(
      [copy({ source: 'bin', destination: '~/bin', dirMode: true })],
      repo,
      { homeDir: home },
    );

    expect(report.entries.map((e) => [e.target, e.status])).toEqual([
      [join(home, 'bin', 'lib'), 'skipped'],
      [join(home, 'bin', 'x'), 'created'],
      [join(home, 'bin', 'y'), 'created'],
    ]);
    expect(readFileSync(join(home, 'bin', 'x'), 'utf-8')).toBe('x');
    expect(lstatSync(join(home, 'bin', 'x')).isSymbolicLink()).toBe(false);
  });

  it('should require an existing destination directory for a dirMode copy', () => {
    mkdirSync(join(repo, 'bin'));
    writeFileSync(join(repo, 'bin', 'x'), 'x');

    const report = runActions(
      [copy({ source: 'bin', destination: join(home, 'bin'), dirMode: true })],
      repo,
    );

    expect(report.entries.map((e) => e.error)).toEqual(['NotADirectoryError']);
  });

  it('should concatenate sources with a cat action', () => {
    writeFileSync(join(repo, 'head'), 'one\n');
    writeFileSync(join(repo, 'tail'), 'two\n');

    const report = runActions([cat(join(home, '.profile'), 'head', 'tail')], repo);

    expect(report.entries[0]).toMatchObject({
      action: 'cat',
      source: `${join(repo, 'head')}, ${join(repo, 'tail')}`,
      status: 'created',
    });
    expect(readFileSync(join(home, '.profile'), 'utf-8')).toBe('one\ntwo\n');
  });

  it('should not write through a link into the repository', () => {
    writeFileSync(join(repo, 'profile'), 'canonical\n');
    writeFileSync(join(repo, 'extra'), 'extra\n');
    writeFileSync(join(repo, 'gitconfig'), '[user]\n');

    const report = runActions(
      [
        symlink({ source: 'profile', destination: '~/.profile' }),
        cat('~/.profile', 'extra'),
        symlink({ source: 'gitconfig', destination: '~/.gitconfig' }),
        copy({ source: 'extra', destination: '~/.gitconfig', overwrite: true }),
      ],
      repo,
      { homeDir: home },
    );

    expect(report.entries.map((e) => [e.action, e.status, e.error])).toEqual([
      ['symlink', 'created', undefined],
      ['cat', 'conflict', 'ConflictError'],
      ['symlink', 'created', undefined],
      ['copy', 'conflict', 'ConflictError'],
    ]);
    expect(readFileSync(join(repo, 'profile'), 'utf-8')).toBe('canonical\n');
    expect(readFileSync(join(repo, 'gitconfig'), 'utf-8')).toBe('[user]\n');
  });

  it.runIf(process.getuid?.() !== 0)(
    'should report PermissionError for a read-only parent and keep going',
    () => {
      writeFileSync(join(repo, 'vimrc'), '');
      writeFileSync(join(repo, 'zshrc'), '');
      const locked = join(home, 'locked');
      mkdirSync(locked);
      chmodSync(locked, 0o555);

      try {
        const report = runActions(
          [
            symlink({ source: 'vimrc', destination: join(locked, '.vimrc') }),
            symlink({ source: 'zshrc', destination: join(home, '.zshrc') }),
          ],
          repo,
        );

        expect(report.entries.map((e) => [e.status, e.error])).toEqual([
          ['error', 'PermissionError'],
          ['created', undefined],
        ]);
        expect(report.entries[0].reason).toBe(
          `permission denied while trying to create a symlink at ${join(locked, '.vimrc')}`,
        );
        expect(readdirSync(locked)).toEqual([]);
      } finally {
        chmodSync(locked, 0o755);
      }
    },
  );

  it('should log created links through the given logger', () => {
    writeFileSync(join(repo, 'vimrc'), '');
    const lines: string[] = [];
    const logger = new ConsoleLogger('debug', (line) => lines.push(line));

    runActions([symlink({ source: 'vimrc', destination: join(home, '.vimrc') })], repo, {
      logger,
    });

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('Exec symlink(source=vimrc');
    expect(lines[1]).toContain(`Linked ${join(home, '.vimrc')} → ${join(repo, 'vimrc')}`);
  });
});

describe('describeAction', () => {
  it('should render each action type', () => {
    expect(describeAction(symlink({ source: 'a', destination: '~/a' }))).toBe(
      'symlink(source=a, destination=~/a, dirMode=false)',
    );
    expect(describeAction(mkdir('~/.cache', { parents: false }))).toBe(
      'mkdir(directory=~/.cache, parents=false)',
    );
    expect(describeAction(copy({ source: 'b', destination: '~/b', overwrite: true }))).toBe(
      'copy(source=b, destination=~/b, dirMode=false, overwrite=true)',
    );
    expect(describeAction(cat('~/.profile', 'x', 'y'))).toBe(
      'cat(destination=~/.profile, sources=x, y)',
    );
  });
});
