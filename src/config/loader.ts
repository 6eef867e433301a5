/**
 * Resolves the run configuration from defaults, file, environment and flags.
 *
 * @packageDocumentation
 */

import { safeExists, safeReadText } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILE } from './defaults.js';
import { applyEnvOverrides, mergeConfig, type EnvRecord } from './env.js';
import { ConfigParseError, parseConfig } from './parser.js';
import type { Config, PartialConfig, ResolvedConfig } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Inputs for configuration resolution.
 */
export interface ResolveConfigOptions {
  /**
   * Explicit config file. Must exist when given. When omitted,
   * window-enrich.toml in the working directory is used if present.
   */
  configPath?: string;
  /** Environment to read overrides from (defaults to process.env). */
  env?: EnvRecord;
  /** Highest-precedence overrides, typically from command-line flags. */
  overrides?: PartialConfig;
}

async function loadFileConfig(configPath: string | undefined): Promise<Config> {
  const candidate = configPath ?? DEFAULT_CONFIG_FILE;

  if (!(await safeExists(candidate))) {
    if (configPath !== undefined) {
      throw new ConfigParseError(`Config file not found: ${configPath}`);
    }
    return DEFAULT_CONFIG;
  }

  let content: string;
  try {
    content = await safeReadText(candidate);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigParseError(`Cannot read config file ${candidate}`, cause);
  }
  return parseConfig(content);
}

function freezeConfig(config: Config): ResolvedConfig {
  return Object.freeze({
    scan: Object.freeze({ ...config.scan }),
    service: Object.freeze({ ...config.service }),
    output: Object.freeze({ ...config.output }),
    logging: Object.freeze({ ...config.logging }),
  });
}

/**
 * Builds the validated, frozen configuration for a run.
 *
 * Precedence: overrides > env > config file > defaults.
 *
 * @throws ConfigParseError if the file is missing (when named) or malformed.
 * @throws EnvCoercionError if an environment variable has a bad value.
 * @throws ConfigValidationError if the merged configuration is invalid.
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
  const fileConfig = await loadFileConfig(options.configPath);
  const withEnv = applyEnvOverrides(fileConfig, options.env ?? process.env);
  const merged = mergeConfig(withEnv, options.overrides ?? {});

  assertConfigValid(merged);

  return freezeConfig(merged);
}
