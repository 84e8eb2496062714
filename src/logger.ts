import pc from 'picocolors';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/** Map the number of `-v` flags to a level: none → warn, one → info, more → debug. */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

type Sink = (line: string) => void;

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly write: Sink = (line) => console.error(line),
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  error(message: string): void {
    if (this.enabled('error')) this.write(`${pc.red('error')} ${message}`);
  }

  warn(message: string): void {
    if (this.enabled('warn')) this.write(`${pc.yellow('warn')}  ${message}`);
  }

  info(message: string): void {
    if (this.enabled('info')) this.write(`${pc.cyan('info')}  ${message}`);
  }

  debug(message: string): void {
    if (this.enabled('debug')) this.write(`${pc.dim('debug')} ${pc.dim(message)}`);
  }
}

export const silentLogger: Logger = new ConsoleLogger('silent');
