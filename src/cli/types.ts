/**
 * CLI types and interfaces for the protostub CLI.
 */

import type { Config } from '../config/types.js';
import type { ProjectLayout } from '../config/layout.js';
import type { CommandRunner } from '../toolchain/types.js';
import type { Logger } from '../utils/logger.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Writes one line of output.
 */
export type LineWriter = (line: string) => void;

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * The validated configuration.
   */
  config: Config;

  /**
   * Absolute project paths derived from the configuration.
   */
  layout: ProjectLayout;

  /**
   * Structured logger for the run.
   */
  logger: Logger;

  /**
   * Runs git, the compiler and the interpreter.
   */
  runner: CommandRunner;

  /**
   * Display options for human-facing output.
   */
  display: DisplayOptions;

  /**
   * Progress and summary lines (stdout).
   */
  out: LineWriter;

  /**
   * Error reports (stderr).
   */
  err: LineWriter;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
