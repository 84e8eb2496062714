export { symlink, mkdir, copy, cat } from './actions.ts';
export type { SymlinkOptions, CopyOptions } from './actions.ts';
export { runActions, describeAction } from './engine.ts';
export type { RunOptions } from './engine.ts';
export {
  loadConfig,
  loadJsonConfig,
  loadScriptedConfig,
  getConfigPath,
  parseAction,
  parseActions,
  CONFIG_DIRECTORY,
} from './config.ts';
export { summarizeReport, reportSucceeded, symlinkConflicts } from './report.ts';
export type { ReportSummary } from './report.ts';
export * from './errors.ts';
export type * from './types.ts';
