/**
 * Locates, parses, overrides and validates the project configuration.
 *
 * @packageDocumentation
 */

import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';
import { readEnvOverrides, mergeConfig, type EnvRecord } from './env.js';
import { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
import { assertConfigValid } from './validator.js';
import type { Config } from './types.js';

/** Config file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'protostub.toml';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Explicit config file path; must exist when given. */
  configPath?: string;
  /** Working directory. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Environment to read overrides from. Defaults to `process.env`. */
  env?: EnvRecord;
}

/**
 * A loaded configuration and where it came from.
 */
export interface LoadedConfig {
  /** The validated configuration. */
  config: Config;
  /** Project root: the config file's directory, or the working directory. */
  root: string;
  /** Absolute path of the config file read, if any. */
  configPath: string | undefined;
  /** Environment variables that overrode a value. */
  appliedEnvVars: string[];
}

function readConfigFile(filePath: string): Config {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Failed to read config file ${filePath}: ${cause.message}`, cause);
  }
  return parseConfig(content);
}

/**
 * Loads the configuration with precedence env > file > defaults.
 *
 * Without `configPath`, `protostub.toml` in the working directory is used
 * when present and the built-in defaults otherwise.
 *
 * @param options - Lookup options.
 * @returns The validated configuration and its project root.
 * @throws ConfigParseError if the file is missing, unreadable or malformed.
 * @throws EnvCoercionError if an environment override cannot be coerced.
 * @throws ConfigValidationError if the merged configuration is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;

  let configPath: string | undefined;
  if (options.configPath !== undefined) {
    configPath = path.resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigParseError(`Config file not found: ${configPath}`);
    }
  } else {
    const candidate = path.join(cwd, CONFIG_FILE_NAME);
    configPath = existsSync(candidate) ? candidate : undefined;
  }

  const fileConfig = configPath === undefined ? getDefaultConfig() : readConfigFile(configPath);
  const { overrides, appliedVars } = readEnvOverrides(env);
  const config = mergeConfig(fileConfig, overrides);
  assertConfigValid(config);

  return {
    config,
    root: configPath === undefined ? cwd : path.dirname(configPath),
    configPath,
    appliedEnvVars: appliedVars,
  };
}
