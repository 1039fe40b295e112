/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

/* eslint-disable no-console */
import type { BuildError } from '../../toolchain/types.js';
import { formatBuildError } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: exits with the result's exit code
 * - On error (Error instance): logs the error message and exits with 1
 * - On other errors: logs the stringified value and exits with 1
 *
 * @param fn - The function to wrap (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error(`Error: ${String(error)}`);
      }
      process.exit(1);
    }
  })();
}

/**
 * Logs a build failure, prints it with suggestions and returns exit code 1.
 *
 * @param context - The command context.
 * @param error - The failure from a build step.
 */
export function reportBuildFailure(context: CliContext, error: BuildError): CliCommandResult {
  context.logger.error('step_failed', {
    kind: error.kind,
    step: error.step,
    message: error.message,
    ...(error.command === undefined ? {} : { command: error.command }),
    ...(error.exitCode === undefined ? {} : { exitCode: error.exitCode }),
  });
  context.err(formatBuildError(error, context.display));
  return { exitCode: 1, message: error.message };
}
