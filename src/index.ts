/**
 * protostub
 *
 * Fetches protocol buffer definitions, compiles them to Python stubs,
 * relocates the stubs into a flat package and rewrites their imports.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './config/index.js';
export * from './generate/index.js';
export * from './rewrite/index.js';
export * from './verify/index.js';
export * from './clean/index.js';
export {
  commandFailure,
  createFailureResult,
  createSuccessResult,
  filesystemFailure,
} from './toolchain/types.js';
export type {
  BuildError,
  BuildErrorKind,
  BuildStep,
  CommandOptions,
  CommandOutput,
  CommandRunner,
  StepFailure,
  StepResult,
} from './toolchain/types.js';
export { ExecaCommandRunner, createCommandRunner, formatCommand } from './toolchain/process.js';
export { Logger, createLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
