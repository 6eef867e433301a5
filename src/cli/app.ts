/**
 * The `window-enrich` command.
 *
 * Every fatal check (arguments, configuration, gene list, window sizes) runs
 * before the first call to DAVID, authentication included.
 *
 * @packageDocumentation
 */

import { resolveConfig } from '../config/loader.js';
import type { EnvRecord } from '../config/env.js';
import { connectDavidService, type DavidPortFactory } from '../enrichment/david-service.js';
import { loadGeneList } from '../genes/loader.js';
import { writeWorkbook } from '../output/workbook.js';
import { runScan } from '../pipeline/runner.js';
import { Logger, type LogLevel } from '../utils/logger.js';
import { safeMkdir } from '../utils/safe-fs.js';
import { countWindows } from '../windows/generator.js';
import { HELP_TEXT, parseArgs } from './args.js';

/**
 * Process-level collaborators, replaceable in tests.
 */
export interface CliDependencies {
  /** Environment for overrides (default: process.env). */
  readonly env?: EnvRecord;
  /** Destination of help output (default: process.stdout). */
  readonly stdout?: (text: string) => void;
  /** Destination of log lines (default: process.stderr). */
  readonly logSink?: (line: string) => void;
  /** DAVID port factory (default: the `soap` client). */
  readonly portFactory?: DavidPortFactory;
  readonly sleep?: (ms: number) => Promise<void>;
  /** Clock for log timestamps and the workbook date. */
  readonly now?: () => Date;
}

function createLogger(deps: CliDependencies, level: LogLevel): Logger {
  return new Logger({
    component: 'window-enrich',
    level,
    ...(deps.logSink !== undefined ? { sink: deps.logSink } : {}),
    ...(deps.now !== undefined ? { now: deps.now } : {}),
  });
}

function defaultStdout(text: string): void {
  process.stdout.write(text);
}

async function execute(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const args = parseArgs(argv);
  if (args.kind === 'help') {
    (deps.stdout ?? defaultStdout)(HELP_TEXT);
    return 0;
  }

  const config = await resolveConfig({
    env: deps.env ?? process.env,
    overrides: args.overrides,
    ...(args.configPath !== undefined ? { configPath: args.configPath } : {}),
  });
  const runLogger = createLogger(deps, config.logging.level);

  const genes = await loadGeneList(args.input, runLogger.child('GeneListLoader'));
  countWindows(genes.length, config.scan.window_size, config.scan.step_size);
  await safeMkdir(config.output.outdir);

  const service = await connectDavidService({
    email: config.service.email,
    wsdlUrl: config.service.wsdl_url,
    endpoint: config.service.endpoint,
    timeoutMs: config.service.timeout_seconds * 1000,
    logger: runLogger.child('DavidService'),
    ...(deps.portFactory !== undefined ? { portFactory: deps.portFactory } : {}),
  });

  const result = await runScan(genes, config, {
    service,
    logger: runLogger.child('ScanRunner'),
    ...(deps.sleep !== undefined ? { sleep: deps.sleep } : {}),
  });

  const workbook = await writeWorkbook({
    all: result.all,
    filtered: result.filtered,
    maxClusters: config.scan.max_clusters,
    pvalThreshold: config.scan.pval_threshold,
    charts: config.output.charts,
    outdir: config.output.outdir,
    species: config.output.species,
    date: deps.now?.() ?? new Date(),
  });
  runLogger.info('workbook_written', { file: workbook, sheets: config.output.charts ? 3 : 2 });

  runLogger.info('run_completed', {
    workbook,
    windows: result.windowCount,
    failedWindows: result.failedWindows,
    significantWindows: result.filtered.length,
  });
  return 0;
}

/**
 * Runs the command and returns its exit status.
 *
 * Failures are logged as `run_failed` and give status 1.
 *
 * @param argv - Arguments without the node and script entries.
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  // Failures can happen before the configured level is known.
  const logger = createLogger(deps, 'info');
  try {
    return await execute(argv, deps);
  } catch (error) {
    logger.error('run_failed', {
      error: error instanceof Error ? error.name : 'Error',
      message: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }
}
