/**
 * window-enrich
 *
 * Sliding-window functional enrichment along a genome-ordered gene list,
 * using the DAVID web service for annotation clustering.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './config/index.js';
export * from './enrichment/index.js';
export { GeneListError, loadGeneList, parseGeneList } from './genes/loader.js';
export type { GeneList, ParsedGeneList } from './genes/loader.js';
export {
  WindowValidationError,
  countWindows,
  generateWindows,
  windowLabel,
  windowListName,
} from './windows/generator.js';
export type { Window, WindowValidationCode } from './windows/generator.js';
export * from './report/index.js';
export * from './summary/index.js';
export * from './output/index.js';
export { reportArtifactPath, runScan } from './pipeline/runner.js';
export type { ScanDependencies, ScanResult } from './pipeline/runner.js';
export { CliUsageError, HELP_TEXT, parseArgs } from './cli/args.js';
export type { ParsedArgs } from './cli/args.js';
export { runCli } from './cli/app.js';
export type { CliDependencies } from './cli/app.js';
export { Logger, LOG_LEVELS, isLogLevel, silentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
export { PathValidationError } from './utils/safe-fs.js';
