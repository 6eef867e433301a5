/**
 * Environment variable overrides for configuration.
 *
 * `DAVID_EMAIL` supplies the service credential; every other field can be set
 * through `WINDOW_ENRICH_<SECTION>_<FIELD>`, e.g. `WINDOW_ENRICH_SCAN_STEP_SIZE`.
 *
 * Override precedence: CLI flags > env > config file > defaults
 *
 * @packageDocumentation
 */

import { isLogLevel, type LogLevel } from '../utils/logger.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(
      message ??
        `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`
    );
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type EnvMapping =
  | { readonly type: 'string'; readonly apply: (target: PartialConfig, value: string) => void }
  | { readonly type: 'number'; readonly apply: (target: PartialConfig, value: number) => void }
  | { readonly type: 'boolean'; readonly apply: (target: PartialConfig, value: boolean) => void }
  | { readonly type: 'log level'; readonly apply: (target: PartialConfig, value: LogLevel) => void };

const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvMapping>> = {
  DAVID_EMAIL: {
    type: 'string',
    apply: (t, v) => {
      (t.service ??= {}).email = v;
    },
  },

  WINDOW_ENRICH_SCAN_WINDOW_SIZE: {
    type: 'number',
    apply: (t, v) => {
      (t.scan ??= {}).window_size = v;
    },
  },
  WINDOW_ENRICH_SCAN_STEP_SIZE: {
    type: 'number',
    apply: (t, v) => {
      (t.scan ??= {}).step_size = v;
    },
  },
  WINDOW_ENRICH_SCAN_MAX_CLUSTERS: {
    type: 'number',
    apply: (t, v) => {
      (t.scan ??= {}).max_clusters = v;
    },
  },
  WINDOW_ENRICH_SCAN_PVAL_THRESHOLD: {
    type: 'number',
    apply: (t, v) => {
      (t.scan ??= {}).pval_threshold = v;
    },
  },

  WINDOW_ENRICH_SERVICE_EMAIL: {
    type: 'string',
    apply: (t, v) => {
      (t.service ??= {}).email = v;
    },
  },
  WINDOW_ENRICH_SERVICE_WSDL_URL: {
    type: 'string',
    apply: (t, v) => {
      (t.service ??= {}).wsdl_url = v;
    },
  },
  WINDOW_ENRICH_SERVICE_ENDPOINT: {
    type: 'string',
    apply: (t, v) => {
      (t.service ??= {}).endpoint = v;
    },
  },
  WINDOW_ENRICH_SERVICE_TIMEOUT_SECONDS: {
    type: 'number',
    apply: (t, v) => {
      (t.service ??= {}).timeout_seconds = v;
    },
  },
  WINDOW_ENRICH_SERVICE_RETRIES: {
    type: 'number',
    apply: (t, v) => {
      (t.service ??= {}).retries = v;
    },
  },
  WINDOW_ENRICH_SERVICE_WAIT_SECONDS: {
    type: 'number',
    apply: (t, v) => {
      (t.service ??= {}).wait_seconds = v;
    },
  },

  WINDOW_ENRICH_OUTPUT_OUTDIR: {
    type: 'string',
    apply: (t, v) => {
      (t.output ??= {}).outdir = v;
    },
  },
  WINDOW_ENRICH_OUTPUT_SPECIES: {
    type: 'string',
    apply: (t, v) => {
      (t.output ??= {}).species = v;
    },
  },
  WINDOW_ENRICH_OUTPUT_CHARTS: {
    type: 'boolean',
    apply: (t, v) => {
      (t.output ??= {}).charts = v;
    },
  },

  WINDOW_ENRICH_LOGGING_LEVEL: {
    type: 'log level',
    apply: (t, v) => {
      (t.logging ??= {}).level = v;
    },
  },
};

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts true/1/yes/on and false/0/no/off, case-insensitive.
 *
 * @throws EnvCoercionError for anything else.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

function coerceToLogLevel(value: string, envVar: string): LogLevel {
  const trimmed = value.trim().toLowerCase();
  if (!isLogLevel(trimmed)) {
    throw new EnvCoercionError(envVar, value, 'log level');
  }
  return trimmed;
}

function applyMapping(
  mapping: EnvMapping,
  target: PartialConfig,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(target, value);
      return;
    case 'number':
      mapping.apply(target, coerceToNumber(value, envVar));
      return;
    case 'boolean':
      mapping.apply(target, coerceToBoolean(value, envVar));
      return;
    case 'log level':
      mapping.apply(target, coerceToLogLevel(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied, in mapping order. */
  appliedVars: string[];
  /** Coercion errors, when collected instead of thrown. */
  errors: EnvCoercionError[];
}

/**
 * Reads recognised environment variables into a partial configuration.
 *
 * Empty values are treated as unset.
 *
 * @param env - Environment to read (defaults to process.env).
 * @param options - Set collectErrors to gather coercion errors instead of throwing.
 * @throws EnvCoercionError on the first bad value unless collectErrors is set.
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    // eslint-disable-next-line security/detect-object-injection -- safe: envVar comes from the fixed mapping table
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(mapping, overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - Values that take precedence over the base.
 * @returns A new configuration.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    scan: { ...base.scan, ...partial.scan },
    service: { ...base.service, ...partial.service },
    output: { ...base.output, ...partial.output },
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Names of all recognised environment variables.
 */
export function getRecognizedEnvVars(): string[] {
  return Object.keys(ENV_VAR_MAPPINGS);
}
