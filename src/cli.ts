import pc from 'picocolors';
import * as p from '@clack/prompts';
import { readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { parseArgs, type ParsedArgs } from './args.ts';
import { CONFIG_DIRECTORY, getConfigPath, loadConfig } from './config.ts';
import { runActions, type RunOptions } from './engine.ts';
import { ConsoleLogger, levelFromVerbosity, type Logger } from './logger.ts';
import {
  formatEntry,
  formatSummary,
  reportSucceeded,
  summarizeReport,
  symlinkConflicts,
} from './report.ts';
import type { ExecutionReport } from './types.ts';

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'),
    );
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function showHelp(): void {
  console.log(`
${pc.bold('linkdots')} — Link dotfiles from a repository into place

${pc.bold('Usage:')} linkdots [options]

${pc.bold('Options:')}
  -c, --config <path>    Config file or directory to use instead of the default
  -p, --profile <name>   Load profiles/<name> from the config directory
  -2, --config2          Use the scripted config format (dotfile_repo + config module)
  -d, --dry-run          Show what would change without changing anything
  -f, --force            Replace symlinks that point elsewhere (never regular files)
  -y, --yes              Never prompt
  -v, --verbose          More output (-vv for debug)
      --version          Show version
  -h, --help             Show this help

${pc.bold('Examples:')}
  ${pc.dim('$')} linkdots                    ${pc.dim('# ~/.config/linkdots/config.json')}
  ${pc.dim('$')} linkdots -2                 ${pc.dim('# ~/.config/linkdots/{dotfile_repo,config.ts}')}
  ${pc.dim('$')} linkdots -p laptop -d -v    ${pc.dim('# preview the laptop profile')}

${pc.dim(`Config directory: ${CONFIG_DIRECTORY}`)}
`);
}

function printReport(report: ExecutionReport): void {
  for (const entry of report.entries) {
    console.log(formatEntry(entry));
  }
  console.log();
  console.log(formatSummary(summarizeReport(report)));
}

function resolveConfigPath(args: ParsedArgs, logger: Logger): string {
  if (args.config) {
    if (args.profile) logger.warn('--profile is ignored when --config is given');
    return resolve(args.config);
  }
  return getConfigPath({ profile: args.profile, config2: args.config2 });
}

/** Offer to replace foreign symlinks when a human is there to answer. */
async function confirmReplace(report: ExecutionReport, args: ParsedArgs): Promise<boolean> {
  if (args.yes || args.force || args.dryRun || !process.stdin.isTTY) return false;
  const count = symlinkConflicts(report).length;
  if (count === 0) return false;

  console.log();
  const answer = await p.confirm({
    message: `Replace ${count} symlink${count === 1 ? '' : 's'} pointing elsewhere?`,
    initialValue: false,
  });
  if (p.isCancel(answer)) {
    p.cancel('Cancelled.');
    return false;
  }
  return answer;
}

// ── Main ──────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (args.version) {
    console.log(getVersion());
    return;
  }
  if (args.help) {
    showHelp();
    return;
  }

  const logger = new ConsoleLogger(levelFromVerbosity(args.verbose));
  const configPath = resolveConfigPath(args, logger);
  logger.info(`Loading config from ${configPath}`);

  const config = await loadConfig(configPath, { config2: args.config2 });
  logger.info(`Dotfile repository: ${config.dotfileRepo}`);

  const options: RunOptions = {
    conflictPolicy: args.force ? 'replace-symlinks' : 'skip',
    dryRun: args.dryRun,
    logger,
  };

  console.log();
  if (args.dryRun) {
    console.log(pc.yellow('  Dry run — no changes will be made\n'));
  }

  let report = runActions(config.actions, config.dotfileRepo, options);
  printReport(report);

  if (await confirmReplace(report, args)) {
    console.log();
    report = runActions(config.actions, config.dotfileRepo, {
      ...options,
      conflictPolicy: 'replace-symlinks',
    });
    printReport(report);
  }

  console.log();
  if (!reportSucceeded(report)) {
    p.log.error('Some actions did not complete; see above.');
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(pc.red(`Error: ${e instanceof Error ? e.message : e}`));
  process.exit(1);
});
