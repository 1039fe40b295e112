/**
 * Environment variable overrides for configuration.
 *
 * Supports PROTOSTUB_* environment variables that override configuration
 * values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig, RewriteStyle } from './types.js';

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

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * How one environment variable is coerced and where it lands.
 */
type EnvVarMapping =
  | {
      readonly type: 'string';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: string) => void;
    }
  | {
      readonly type: 'boolean';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: boolean) => void;
    }
  | {
      readonly type: 'list';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: string[]) => void;
    }
  | {
      readonly type: 'rewrite_style';
      readonly description: string;
      readonly apply: (overrides: PartialConfig, value: RewriteStyle) => void;
    };

/**
 * Supported environment variables, applied in declaration order.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  PROTOSTUB_REPOSITORY_URL: {
    type: 'string',
    description: 'Override the proto repository clone URL',
    apply: (o, v) => {
      o.repository = { ...o.repository, url: v };
    },
  },
  PROTOSTUB_REPOSITORY_REMOTE: {
    type: 'string',
    description: 'Override the remote name used for pulls',
    apply: (o, v) => {
      o.repository = { ...o.repository, remote: v };
    },
  },
  PROTOSTUB_REPOSITORY_BRANCH: {
    type: 'string',
    description: 'Override the branch pulled on every run',
    apply: (o, v) => {
      o.repository = { ...o.repository, branch: v };
    },
  },
  PROTOSTUB_REPOSITORY_CHECKOUT_DIR: {
    type: 'string',
    description: 'Override the checkout directory',
    apply: (o, v) => {
      o.repository = { ...o.repository, checkout_dir: v };
    },
  },
  PROTOSTUB_REPOSITORY_PROTO_ROOT: {
    type: 'string',
    description: 'Override the proto root inside the checkout',
    apply: (o, v) => {
      o.repository = { ...o.repository, proto_root: v };
    },
  },
  PROTOSTUB_PATHS_SCRATCH_DIR: {
    type: 'string',
    description: 'Override the scratch directory',
    apply: (o, v) => {
      o.paths = { ...o.paths, scratch_dir: v };
    },
  },
  PROTOSTUB_PATHS_PACKAGE_DIR: {
    type: 'string',
    description: 'Override the generated package directory',
    apply: (o, v) => {
      o.paths = { ...o.paths, package_dir: v };
    },
  },
  PROTOSTUB_COMPILER_EXECUTABLE: {
    type: 'string',
    description: 'Override the protocol compiler executable',
    apply: (o, v) => {
      o.compiler = { ...o.compiler, executable: v };
    },
  },
  PROTOSTUB_REWRITE_STYLE: {
    type: 'rewrite_style',
    description: 'Override the rewrite style (relative, absolute)',
    apply: (o, v) => {
      o.rewrite = { ...o.rewrite, style: v };
    },
  },
  PROTOSTUB_REWRITE_PACKAGE: {
    type: 'string',
    description: 'Override the dotted package name used by absolute rewrites and probes',
    apply: (o, v) => {
      o.rewrite = { ...o.rewrite, package: v };
    },
  },
  PROTOSTUB_VERIFY_INTERPRETER: {
    type: 'string',
    description: 'Override the interpreter used for load probes',
    apply: (o, v) => {
      o.verify = { ...o.verify, interpreter: v };
    },
  },
  PROTOSTUB_VERIFY_MODULES: {
    type: 'list',
    description: 'Comma-separated modules to probe instead of the discovered ones',
    apply: (o, v) => {
      o.verify = { ...o.verify, modules: v };
    },
  },
  PROTOSTUB_LOGGING_DEBUG: {
    type: 'boolean',
    description: 'Enable or disable debug log entries (true/false)',
    apply: (o, v) => {
      o.logging = { ...o.logging, debug: v };
    },
  },
  PROTOSTUB_DEBUG: {
    type: 'boolean',
    description: 'Shortcut for PROTOSTUB_LOGGING_DEBUG',
    apply: (o, v) => {
      o.logging = { ...o.logging, debug: v };
    },
  },
};

/**
 * Coerces a string value to a boolean.
 *
 * Accepts `true/1/yes/on` and `false/0/no/off`, case-insensitively.
 *
 * @throws EnvCoercionError if the value is not recognised.
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

function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function coerceToRewriteStyle(value: string, envVar: string): RewriteStyle {
  const trimmed = value.trim();
  if (trimmed === 'relative' || trimmed === 'absolute') {
    return trimmed;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'rewrite style',
    `Cannot coerce '${envVar}' value '${value}' to rewrite style. Expected one of: relative, absolute`
  );
}

function applyMapping(
  mapping: EnvVarMapping,
  overrides: PartialConfig,
  value: string,
  envVar: string
): void {
  switch (mapping.type) {
    case 'string':
      mapping.apply(overrides, value);
      return;
    case 'boolean':
      mapping.apply(overrides, coerceToBoolean(value, envVar));
      return;
    case 'list':
      mapping.apply(overrides, coerceToList(value));
      return;
    case 'rewrite_style':
      mapping.apply(overrides, coerceToRewriteStyle(value, envVar));
      return;
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** Environment variables that were applied, in application order. */
  appliedVars: string[];
}

/**
 * Reads PROTOSTUB_* environment variables into a partial configuration.
 * Unset and empty variables are ignored.
 *
 * @param env - The environment object to read from.
 * @returns The overrides and the names of the variables applied.
 * @throws EnvCoercionError if a value cannot be coerced.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ PROTOSTUB_REWRITE_STYLE: 'absolute' });
 * console.log(overrides.rewrite?.style); // "absolute"
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrideResult {
  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    applyMapping(mapping, overrides, value, envVar);
    appliedVars.push(envVar);
  }

  return { overrides, appliedVars };
}

/**
 * Merges a partial configuration into a full configuration. Units are
 * never overridden.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    repository: { ...base.repository, ...partial.repository },
    paths: { ...base.paths, ...partial.paths },
    compiler: { ...base.compiler, ...partial.compiler },
    rewrite: { ...base.rewrite, ...partial.rewrite },
    verify: { ...base.verify, ...partial.verify },
    units: base.units,
    logging: { ...base.logging, ...partial.logging },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from.
 * @returns A new configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);
  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
