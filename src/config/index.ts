/**
 * Configuration module: defaults, window-enrich.toml parsing, environment
 * overrides and semantic validation.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, parseConfig } from './parser.js';
export type {
  Config,
  LoggingConfig,
  OutputConfig,
  PartialConfig,
  ResolvedConfig,
  ScanConfig,
  ServiceConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_ENDPOINT,
  DEFAULT_LOGGING,
  DEFAULT_OUTPUT,
  DEFAULT_SCAN,
  DEFAULT_SERVICE,
  DEFAULT_WSDL_URL,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getRecognizedEnvVars,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { resolveConfig } from './loader.js';
export type { ResolveConfigOptions } from './loader.js';
