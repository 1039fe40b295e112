/**
 * TOML configuration parser for protostub.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_COMPILER,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
  DEFAULT_REPOSITORY,
  DEFAULT_REWRITE,
  DEFAULT_UNITS,
  DEFAULT_VERIFY,
} from './defaults.js';
import type {
  CompilerConfig,
  Config,
  GenerationUnit,
  LoggingConfig,
  PathConfig,
  RepositoryConfig,
  RewriteConfig,
  RewriteStyle,
  VerifyConfig,
} from './types.js';

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

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value === null ? 'null' : typeof value;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @throws ConfigParseError if value is not an array or holds a non-string.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${describeType(value)}`
    );
  }
  return value.map((item, index) => validateString(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates that a value is a table, returning undefined for a missing section.
 *
 * @throws ConfigParseError if value is present but not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates a rewrite style value.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The rewrite style.
 * @throws ConfigParseError if value is not `relative` or `absolute`.
 */
export function validateRewriteStyle(value: unknown, fieldPath: string): RewriteStyle {
  const style = validateString(value, fieldPath);
  if (style !== 'relative' && style !== 'absolute') {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected 'relative' or 'absolute', got '${style}'`
    );
  }
  return style;
}

function parseRepository(raw: Record<string, unknown> | undefined): RepositoryConfig {
  const result: RepositoryConfig = { ...DEFAULT_REPOSITORY };
  if (raw === undefined) {
    return result;
  }

  if ('url' in raw) {
    result.url = validateString(raw.url, 'repository.url');
  }
  if ('remote' in raw) {
    result.remote = validateString(raw.remote, 'repository.remote');
  }
  if ('branch' in raw) {
    result.branch = validateString(raw.branch, 'repository.branch');
  }
  if ('checkout_dir' in raw) {
    result.checkout_dir = validateString(raw.checkout_dir, 'repository.checkout_dir');
  }
  if ('proto_root' in raw) {
    result.proto_root = validateString(raw.proto_root, 'repository.proto_root');
  }

  return result;
}

function parsePaths(raw: Record<string, unknown> | undefined): PathConfig {
  const result: PathConfig = { ...DEFAULT_PATHS };
  if (raw === undefined) {
    return result;
  }

  if ('scratch_dir' in raw) {
    result.scratch_dir = validateString(raw.scratch_dir, 'paths.scratch_dir');
  }
  if ('package_dir' in raw) {
    result.package_dir = validateString(raw.package_dir, 'paths.package_dir');
  }

  return result;
}

function parseCompiler(raw: Record<string, unknown> | undefined): CompilerConfig {
  const result: CompilerConfig = {
    ...DEFAULT_COMPILER,
    extra_args: [...DEFAULT_COMPILER.extra_args],
  };
  if (raw === undefined) {
    return result;
  }

  if ('executable' in raw) {
    result.executable = validateString(raw.executable, 'compiler.executable');
  }
  if ('extra_args' in raw) {
    result.extra_args = validateStringArray(raw.extra_args, 'compiler.extra_args');
  }

  return result;
}

function parseRewrite(raw: Record<string, unknown> | undefined): RewriteConfig {
  const result: RewriteConfig = { ...DEFAULT_REWRITE };
  if (raw === undefined) {
    return result;
  }

  if ('style' in raw) {
    result.style = validateRewriteStyle(raw.style, 'rewrite.style');
  }
  if ('package' in raw) {
    result.package = validateString(raw.package, 'rewrite.package');
  }

  return result;
}

function parseVerify(raw: Record<string, unknown> | undefined): VerifyConfig {
  const result: VerifyConfig = { ...DEFAULT_VERIFY, modules: [...DEFAULT_VERIFY.modules] };
  if (raw === undefined) {
    return result;
  }

  if ('interpreter' in raw) {
    result.interpreter = validateString(raw.interpreter, 'verify.interpreter');
  }
  if ('modules' in raw) {
    result.modules = validateStringArray(raw.modules, 'verify.modules');
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }

  return result;
}

/**
 * Parses the `[[units]]` array of tables. A present array replaces the
 * default units entirely.
 */
function parseUnits(raw: unknown): GenerationUnit[] {
  if (raw === undefined) {
    return DEFAULT_UNITS.map(copyUnit);
  }
  if (!Array.isArray(raw)) {
    throw new ConfigParseError(
      `Invalid type for 'units': expected array of tables, got ${describeType(raw)}`
    );
  }

  return raw.map((entry, index) => {
    const fieldPath = `units[${String(index)}]`;
    const table = validateTable(entry, fieldPath);
    if (table === undefined || !('proto_dir' in table)) {
      throw new ConfigParseError(`Missing required field '${fieldPath}.proto_dir'`);
    }

    const unit: GenerationUnit = {
      proto_dir: validateString(table.proto_dir, `${fieldPath}.proto_dir`),
    };
    if ('files' in table) {
      unit.files = validateStringArray(table.files, `${fieldPath}.files`);
    }
    return unit;
  });
}

function copyUnit(unit: GenerationUnit): GenerationUnit {
  return unit.files === undefined
    ? { proto_dir: unit.proto_dir }
    : { proto_dir: unit.proto_dir, files: [...unit.files] };
}

/**
 * Parses a TOML string into a Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [paths]
 * package_dir = "my_client/_generated"
 *
 * [[units]]
 * proto_dir = "acme/api/v2"
 * `);
 * console.log(config.units.length); // 1
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    repository: parseRepository(validateTable(parsed.repository, 'repository')),
    paths: parsePaths(validateTable(parsed.paths, 'paths')),
    compiler: parseCompiler(validateTable(parsed.compiler, 'compiler')),
    rewrite: parseRewrite(validateTable(parsed.rewrite, 'rewrite')),
    verify: parseVerify(validateTable(parsed.verify, 'verify')),
    units: parseUnits(parsed.units),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}
