/**
 * Command-line argument parsing for `window-enrich`.
 *
 * @packageDocumentation
 */

import type {
  LoggingConfig,
  OutputConfig,
  PartialConfig,
  ScanConfig,
  ServiceConfig,
} from '../config/types.js';
import { isLogLevel, LOG_LEVELS } from '../utils/logger.js';

export const HELP_TEXT = `
window-enrich - sliding-window functional enrichment along genome order (DAVID)

Usage:
  window-enrich --input <file> [options]

Options:
  --input, -i <file>        Gene list, one Entrez Gene ID per line, in genome order (required)
  --outdir, -o <dir>        Output directory (default: results)
  --species <name>          Label used in the workbook file name (default: NA)
  --window-size <n>         Genes per window (default: 100)
  --step-size <n>           Genes between window starts (default: 25)
  --email <addr>            DAVID-registered email (or set DAVID_EMAIL)
  --wait <s>                Pause after every window, and backoff unit (default: 10)
  --timeout <s>             Request timeout (default: 60)
  --retries <n>             Attempts per window (default: 3)
  --pval-threshold <p>      Keep clusters 2+ only at or below this p-value (default: 0.01)
  --max-clusters <n>        Cluster slots per window (default: 3)
  --wsdl-url <url>          DAVID WSDL location
  --endpoint <url>          DAVID SOAP endpoint
  --no-plots                Leave the chart data sheet out of the workbook
  --log <level>             debug, info, warn or error (default: info)
  --config <file>           TOML config file (default: window-enrich.toml if present)
  --help, -h                Show this help message

Precedence: flags > environment (WINDOW_ENRICH_*, DAVID_EMAIL) > config file > defaults.
`;

/**
 * Error thrown for unusable command lines.
 */
export class CliUsageError extends Error {
  /** The offending flag, when there is one. */
  public readonly flag: string | undefined;

  constructor(message: string, flag?: string) {
    super(message);
    this.name = 'CliUsageError';
    this.flag = flag;
  }
}

/**
 * What the command line asks for.
 */
export type ParsedArgs =
  | { readonly kind: 'help' }
  | {
      readonly kind: 'run';
      readonly input: string;
      readonly configPath: string | undefined;
      /** Flag values, applied over every other configuration source. */
      readonly overrides: PartialConfig;
    };

const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--input',
  '-i',
  '--outdir',
  '-o',
  '--species',
  '--window-size',
  '--step-size',
  '--pval-threshold',
  '--max-clusters',
  '--email',
  '--wait',
  '--timeout',
  '--retries',
  '--wsdl-url',
  '--endpoint',
  '--log',
  '--config',
]);

/**
 * Whether `token` can stand as the value of a flag. Long options and the
 * value-taking short flags cannot.
 */
function isFlagValue(token: string | undefined): token is string {
  if (token === undefined) {
    return false;
  }
  return !((token.startsWith('--') && token.length > 2) || VALUE_FLAGS.has(token));
}

/**
 * Looks for `--help` or `-h` in flag position, skipping flag values.
 */
function requestsHelp(argv: readonly string[]): boolean {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') {
      return true;
    }
    if (VALUE_FLAGS.has(arg) && isFlagValue(argv[i + 1])) {
      i++;
    }
  }
  return false;
}

function parseNumber(flag: string, raw: string): number {
  const value = raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new CliUsageError(`Option ${flag} expects a number, got '${raw}'`, flag);
  }
  return value;
}

/**
 * Parses arguments (without the node and script entries).
 *
 * Numbers are only checked for being numeric here; ranges are checked when
 * the configuration is validated.
 *
 * @throws {CliUsageError} For unknown flags, missing values, or a missing --input.
 *
 * @example
 * ```typescript
 * parseArgs(['--input', 'chr1.txt', '--window-size', '50']);
 * // { kind: 'run', input: 'chr1.txt', configPath: undefined,
 * //   overrides: { scan: { window_size: 50 } } }
 * ```
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const scan: Partial<ScanConfig> = {};
  const service: Partial<ServiceConfig> = {};
  const output: Partial<OutputConfig> = {};
  const logging: Partial<LoggingConfig> = {};
  let input: string | undefined;
  let configPath: string | undefined;

  if (requestsHelp(argv)) {
    return { kind: 'help' };
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--no-plots') {
      output.charts = false;
      continue;
    }

    if (!VALUE_FLAGS.has(arg)) {
      throw arg.startsWith('-')
        ? new CliUsageError(`Unknown option '${arg}'`, arg)
        : new CliUsageError(`Unexpected argument '${arg}'`);
    }
    const value = argv[i + 1];
    if (!isFlagValue(value)) {
      throw new CliUsageError(`Option ${arg} requires a value`, arg);
    }
    i++;

    switch (arg) {
      case '--input':
      case '-i':
        input = value;
        break;
      case '--outdir':
      case '-o':
        output.outdir = value;
        break;
      case '--species':
        output.species = value;
        break;
      case '--window-size':
        scan.window_size = parseNumber(arg, value);
        break;
      case '--step-size':
        scan.step_size = parseNumber(arg, value);
        break;
      case '--pval-threshold':
        scan.pval_threshold = parseNumber(arg, value);
        break;
      case '--max-clusters':
        scan.max_clusters = parseNumber(arg, value);
        break;
      case '--email':
        service.email = value;
        break;
      case '--wait':
        service.wait_seconds = parseNumber(arg, value);
        break;
      case '--timeout':
        service.timeout_seconds = parseNumber(arg, value);
        break;
      case '--retries':
        service.retries = parseNumber(arg, value);
        break;
      case '--wsdl-url':
        service.wsdl_url = value;
        break;
      case '--endpoint':
        service.endpoint = value;
        break;
      case '--log':
        if (!isLogLevel(value)) {
          throw new CliUsageError(
            `Option --log expects one of ${LOG_LEVELS.join(', ')}, got '${value}'`,
            arg
          );
        }
        logging.level = value;
        break;
      case '--config':
        configPath = value;
        break;
    }
  }

  if (input === undefined) {
    throw new CliUsageError('Missing required option --input', '--input');
  }

  const overrides: PartialConfig = {};
  if (Object.keys(scan).length > 0) {
    overrides.scan = scan;
  }
  if (Object.keys(service).length > 0) {
    overrides.service = service;
  }
  if (Object.keys(output).length > 0) {
    overrides.output = output;
  }
  if (Object.keys(logging).length > 0) {
    overrides.logging = logging;
  }

  return { kind: 'run', input, configPath, overrides };
}
