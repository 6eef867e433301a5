/**
 * Semantic validation for resolved configuration.
 *
 * The parser only checks value types; this module checks that the values make
 * sense for a scan, so that a bad run is rejected before any request is sent.
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error thrown when configuration validation fails.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * A single validation failure.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of validating a configuration.
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function requirePositiveInteger(value: number, field: string, errors: ValidationError[]): void {
  if (!Number.isInteger(value) || value <= 0) {
    errors.push({
      field,
      value,
      message: `'${field}' must be a positive integer, got ${String(value)}`,
    });
  }
}

function validateScan(config: Config, errors: ValidationError[]): void {
  const { scan } = config;

  requirePositiveInteger(scan.window_size, 'scan.window_size', errors);
  requirePositiveInteger(scan.step_size, 'scan.step_size', errors);
  requirePositiveInteger(scan.max_clusters, 'scan.max_clusters', errors);

  if (!(scan.pval_threshold > 0 && scan.pval_threshold <= 1)) {
    errors.push({
      field: 'scan.pval_threshold',
      value: scan.pval_threshold,
      message: `'scan.pval_threshold' must be greater than 0 and at most 1, got ${String(scan.pval_threshold)}`,
    });
  }
}

function validateService(config: Config, errors: ValidationError[]): void {
  const { service } = config;

  if (service.email.trim() === '') {
    errors.push({
      field: 'service.email',
      value: service.email,
      message: 'A DAVID-registered email is required (pass --email or set DAVID_EMAIL)',
    });
  }

  requirePositiveInteger(service.retries, 'service.retries', errors);

  if (!(service.timeout_seconds > 0)) {
    errors.push({
      field: 'service.timeout_seconds',
      value: service.timeout_seconds,
      message: `'service.timeout_seconds' must be positive, got ${String(service.timeout_seconds)}`,
    });
  }

  if (!(service.wait_seconds >= 0) || !Number.isFinite(service.wait_seconds)) {
    errors.push({
      field: 'service.wait_seconds',
      value: service.wait_seconds,
      message: `'service.wait_seconds' must be a non-negative number, got ${String(service.wait_seconds)}`,
    });
  }

  for (const field of ['wsdl_url', 'endpoint'] as const) {
    // eslint-disable-next-line security/detect-object-injection -- safe: field is a literal key
    const url = service[field];
    if (!URL.canParse(url)) {
      errors.push({
        field: `service.${field}`,
        value: url,
        message: `'service.${field}' must be an absolute URL, got '${url}'`,
      });
    }
  }
}

function validateOutput(config: Config, errors: ValidationError[]): void {
  if (config.output.outdir.trim() === '') {
    errors.push({
      field: 'output.outdir',
      value: config.output.outdir,
      message: "'output.outdir' cannot be empty",
    });
  }
}

/**
 * Validates a configuration and collects every problem found.
 *
 * @param config - The configuration to validate.
 * @returns Validation result with all errors.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateScan(config, errors);
  validateService(config, errors);
  validateOutput(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @throws ConfigValidationError listing every failure.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
