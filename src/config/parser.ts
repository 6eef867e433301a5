/**
 * TOML configuration parser for window-enrich.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isLogLevel } from '../utils/logger.js';
import { DEFAULT_LOGGING, DEFAULT_OUTPUT, DEFAULT_SCAN, DEFAULT_SERVICE } from './defaults.js';
import type { Config, LoggingConfig, OutputConfig, ScanConfig, ServiceConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Reads a top-level table, rejecting non-table values.
 */
function readSection(parsed: Table, name: string): Table | undefined {
  // eslint-disable-next-line security/detect-object-injection -- safe: name is one of the fixed section names
  const value = parsed[name];
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${name}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

function parseScan(raw: Table | undefined): ScanConfig {
  const result: ScanConfig = { ...DEFAULT_SCAN };
  if (raw === undefined) {
    return result;
  }

  if ('window_size' in raw) {
    result.window_size = validateNumber(raw.window_size, 'scan.window_size');
  }
  if ('step_size' in raw) {
    result.step_size = validateNumber(raw.step_size, 'scan.step_size');
  }
  if ('max_clusters' in raw) {
    result.max_clusters = validateNumber(raw.max_clusters, 'scan.max_clusters');
  }
  if ('pval_threshold' in raw) {
    result.pval_threshold = validateNumber(raw.pval_threshold, 'scan.pval_threshold');
  }

  return result;
}

function parseService(raw: Table | undefined): ServiceConfig {
  const result: ServiceConfig = { ...DEFAULT_SERVICE };
  if (raw === undefined) {
    return result;
  }

  if ('email' in raw) {
    result.email = validateString(raw.email, 'service.email');
  }
  if ('wsdl_url' in raw) {
    result.wsdl_url = validateString(raw.wsdl_url, 'service.wsdl_url');
  }
  if ('endpoint' in raw) {
    result.endpoint = validateString(raw.endpoint, 'service.endpoint');
  }
  if ('timeout_seconds' in raw) {
    result.timeout_seconds = validateNumber(raw.timeout_seconds, 'service.timeout_seconds');
  }
  if ('retries' in raw) {
    result.retries = validateNumber(raw.retries, 'service.retries');
  }
  if ('wait_seconds' in raw) {
    result.wait_seconds = validateNumber(raw.wait_seconds, 'service.wait_seconds');
  }

  return result;
}

function parseOutput(raw: Table | undefined): OutputConfig {
  const result: OutputConfig = { ...DEFAULT_OUTPUT };
  if (raw === undefined) {
    return result;
  }

  if ('outdir' in raw) {
    result.outdir = validateString(raw.outdir, 'output.outdir');
  }
  if ('species' in raw) {
    result.species = validateString(raw.species, 'output.species');
  }
  if ('charts' in raw) {
    result.charts = validateBoolean(raw.charts, 'output.charts');
  }

  return result;
}

function parseLogging(raw: Table | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('level' in raw) {
    const level = validateString(raw.level, 'logging.level');
    if (!isLogLevel(level)) {
      throw new ConfigParseError(
        `Invalid value for 'logging.level': expected debug, info, warn or error, got '${level}'`
      );
    }
    result.level = level;
  }

  return result;
}

/**
 * Parses TOML content into a complete configuration.
 *
 * Missing sections and keys take their defaults; unknown keys are ignored.
 *
 * @param tomlContent - The TOML text.
 * @returns The parsed configuration.
 * @throws ConfigParseError on invalid TOML or a value of the wrong type.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [scan]
 * window_size = 50
 * `);
 * config.scan.window_size; // 50
 * config.scan.step_size;   // 25
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(`Invalid TOML syntax: ${String(cause?.message ?? error)}`, cause);
  }

  return {
    scan: parseScan(readSection(parsed, 'scan')),
    service: parseService(readSection(parsed, 'service')),
    output: parseOutput(readSection(parsed, 'output')),
    logging: parseLogging(readSection(parsed, 'logging')),
  };
}
