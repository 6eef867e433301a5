/**
 * Configuration types for window-enrich.toml.
 *
 * Field names mirror the TOML keys.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Windowing and significance settings.
 */
export interface ScanConfig {
  /** Number of genes per window (default: 100). */
  window_size: number;
  /** Offset between consecutive window starts (default: 25). */
  step_size: number;
  /** Number of cluster slots summarised per window (default: 3). */
  max_clusters: number;
  /** P-value above which secondary clusters are dropped (default: 0.01). */
  pval_threshold: number;
}

/**
 * Connection and pacing settings for the DAVID web service.
 */
export interface ServiceConfig {
  /** DAVID-registered email used to authenticate. Required. */
  email: string;
  /** WSDL document URL. */
  wsdl_url: string;
  /** SOAP endpoint that calls are sent to. */
  endpoint: string;
  /** Per-request timeout in seconds. */
  timeout_seconds: number;
  /** Attempts per window before giving up. */
  retries: number;
  /** Base pause in seconds: linear backoff unit and the delay between windows. */
  wait_seconds: number;
}

/**
 * Where and how results are written.
 */
export interface OutputConfig {
  /** Directory for per-window reports and the workbook. */
  outdir: string;
  /** Species short name used in the workbook file name (e.g. LT2, PAO1). */
  species: string;
  /** Whether the chart data sheet is written. */
  charts: boolean;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  level: LogLevel;
}

/**
 * Complete resolved configuration.
 */
export interface Config {
  scan: ScanConfig;
  service: ServiceConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}

/**
 * Configuration fragment used for overrides (environment, CLI flags).
 */
export interface PartialConfig {
  scan?: Partial<ScanConfig>;
  service?: Partial<ServiceConfig>;
  output?: Partial<OutputConfig>;
  logging?: Partial<LoggingConfig>;
}

/**
 * Deeply read-only configuration handed to components once resolved.
 */
export type ResolvedConfig = {
  readonly [Section in keyof Config]: Readonly<Config[Section]>;
};
