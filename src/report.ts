import pc from 'picocolors';
import type { EntryStatus, ExecutionEntry, ExecutionReport } from './types.ts';
import { lstatOrNull } from './utils/fs.ts';

type Colors = ReturnType<typeof pc.createColors>;

export type ReportSummary = Record<EntryStatus, number>;

export function summarizeReport(report: ExecutionReport): ReportSummary {
  const summary: ReportSummary = {
    created: 0,
    replaced: 0,
    unchanged: 0,
    skipped: 0,
    conflict: 0,
    error: 0,
  };
  for (const entry of report.entries) {
    summary[entry.status] += 1;
  }
  return summary;
}

/** A run succeeds when no request ended in a conflict or an error. */
export function reportSucceeded(report: ExecutionReport): boolean {
  return report.entries.every((entry) => entry.status !== 'conflict' && entry.status !== 'error');
}

/** Link conflicts whose destination is (still) a symlink, i.e. replaceable ones. */
export function symlinkConflicts(report: ExecutionReport): ExecutionEntry[] {
  return report.entries.filter(
    (entry) =>
      entry.action === 'symlink' &&
      entry.status === 'conflict' &&
      lstatOrNull(entry.target)?.isSymbolicLink() === true,
  );
}

export function formatEntry(entry: ExecutionEntry, c: Colors = pc): string {
  const arrow = entry.source ? ` ${c.dim('→')} ${entry.source}` : '';
  const reason = entry.reason ? ` ${c.dim(`(${entry.reason})`)}` : '';
  switch (entry.status) {
    case 'created':
      return `  ${c.green('✓')} ${entry.target}${arrow}`;
    case 'replaced':
      return `  ${c.green('✓')} ${entry.target}${arrow}${reason}`;
    case 'unchanged':
    case 'skipped':
      return `  ${c.dim('○')} ${entry.target}${reason}`;
    case 'conflict':
      return `  ${c.yellow('!')} ${entry.target} ${c.yellow(entry.reason ?? 'conflict')}`;
    case 'error':
      return `  ${c.red('✗')} ${entry.target} ${c.red(entry.reason ?? 'failed')}`;
  }
}

export function formatSummary(summary: ReportSummary, c: Colors = pc): string {
  const parts: string[] = [];
  if (summary.created > 0) parts.push(c.green(`${summary.created} created`));
  if (summary.replaced > 0) parts.push(c.green(`${summary.replaced} replaced`));
  if (summary.unchanged > 0) parts.push(c.dim(`${summary.unchanged} unchanged`));
  if (summary.skipped > 0) parts.push(c.dim(`${summary.skipped} skipped`));
  if (summary.conflict > 0) parts.push(c.yellow(`${summary.conflict} conflicts`));
  if (summary.error > 0) parts.push(c.red(`${summary.error} failed`));
  return parts.length > 0 ? `  ${parts.join(', ')}` : '  nothing to do';
}
