export interface ParsedArgs {
  config?: string;
  profile?: string;
  config2: boolean;
  dryRun: boolean;
  force: boolean;
  yes: boolean;
  verbose: number;
  version: boolean;
  help: boolean;
}

/** Parse `process.argv`-style arguments (the first two entries are skipped). */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const parsed: ParsedArgs = {
    config2: false,
    dryRun: false,
    force: false,
    yes: false,
    verbose: 0,
    version: false,
    help: false,
  };

  const takeValue = (i: number, flag: string): string => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--config' || arg === '-c') {
      parsed.config = takeValue(i, arg);
      i++;
    } else if (arg === '--profile' || arg === '-p') {
      parsed.profile = takeValue(i, arg);
      i++;
    } else if (arg === '--config2' || arg === '-2') {
      parsed.config2 = true;
    } else if (arg === '--dry-run' || arg === '-d') {
      parsed.dryRun = true;
    } else if (arg === '--force' || arg === '-f') {
      parsed.force = true;
    } else if (arg === '--yes' || arg === '-y') {
      parsed.yes = true;
    } else if (arg === '--verbose') {
      parsed.verbose++;
    } else if (/^-v+$/.test(arg)) {
      // -v, -vv, ...
      parsed.verbose += arg.length - 1;
    } else if (arg === '--version') {
      parsed.version = true;
    } else if (arg === '--help' || arg === '-h' || arg === 'help') {
      parsed.help = true;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return parsed;
}
