/**
 * Configuration module for protostub.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig, validateRewriteStyle } from './parser.js';
export type {
  CompilerConfig,
  Config,
  GenerationUnit,
  LoggingConfig,
  PartialConfig,
  PathConfig,
  RepositoryConfig,
  RewriteConfig,
  RewriteStyle,
  VerifyConfig,
} from './types.js';
export {
  DEFAULT_COMPILER,
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_PATHS,
  DEFAULT_REPOSITORY,
  DEFAULT_REWRITE,
  DEFAULT_UNITS,
  DEFAULT_VERIFY,
} from './defaults.js';
export {
  ConfigValidationError,
  validateConfig,
  assertConfigValid,
  isIdentifier,
} from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export {
  effectivePackageName,
  packageNameFromDir,
  resolveProject,
  rewriteTargetFor,
} from './layout.js';
export type { ProjectLayout } from './layout.js';
export { CONFIG_FILE_NAME, loadConfig } from './loader.js';
export type { LoadConfigOptions, LoadedConfig } from './loader.js';
