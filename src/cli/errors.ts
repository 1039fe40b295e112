/**
 * Error suggestion system for the protostub CLI.
 *
 * Provides contextual suggestions based on the kind of failure to help
 * users resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError } from '../config/parser.js';
import { ConfigValidationError } from '../config/validator.js';
import { EnvCoercionError } from '../config/env.js';
import type { BuildError, BuildErrorKind } from '../toolchain/types.js';
import { paint, type DisplayOptions } from './utils/displayUtils.js';

/**
 * Failure kinds the CLI reports: the build error kinds plus configuration
 * problems found before any step runs.
 */
export type ErrorType = BuildErrorKind | 'configuration';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  unreachable_dependency: [
    {
      text: 'Check that git, protoc and the interpreter are installed and on PATH',
      action: 'git --version && protoc --version && python3 --version',
    },
    {
      text: 'Check that the proto repository URL and branch are reachable',
      action: 'git ls-remote <repository.url>',
    },
    {
      text: 'Remove a stale or partial checkout and fetch again',
      action: 'protostub clean && protostub generate',
    },
  ],

  compilation: [
    {
      text: 'Review the compiler output above for the failing .proto file and line',
    },
    {
      text: 'Check that every unit directory exists under the proto root',
      action: 'Review [[units]] and repository.proto_root in protostub.toml',
    },
    {
      text: 'Check that the protoc version matches the proto sources',
      action: 'protoc --version',
    },
  ],

  rewrite_mismatch: [
    {
      text: 'The generated import has a shape the rewrite rules do not cover',
    },
    {
      text: 'Add a [[units]] entry for the namespace if the module should be generated locally',
    },
    {
      text: 'Regenerate from a clean checkout if the package holds stale modules',
      action: 'protostub clean && protostub generate',
    },
  ],

  load_verification: [
    {
      text: 'Review the interpreter output above for the failing module',
    },
    {
      text: 'Regenerate the package and check again',
      action: 'protostub generate && protostub check_generate',
    },
    {
      text: 'Check that the protobuf runtime is installed for the interpreter',
      action: 'python3 -m pip show protobuf',
    },
  ],

  filesystem: [
    {
      text: 'Check permissions and free space for the project directories',
    },
    {
      text: 'Remove the scratch and checkout directories and try again',
      action: 'protostub clean',
    },
  ],

  configuration: [
    {
      text: 'Fix the reported fields in protostub.toml',
    },
    {
      text: 'Check PROTOSTUB_* environment variables, which override the file',
      action: 'env | grep PROTOSTUB_',
    },
  ],
};

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Whether an error is a configuration problem the CLI reports itself.
 */
export function isConfigurationError(error: unknown): error is Error {
  return (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  );
}

/**
 * Formats a suggestion for display.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const prefix = paint(`${String(index)}.`, 33, options);
  const actionText =
    suggestion.action !== undefined ? `\n     ${paint(suggestion.action, 2, options)}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

function formatSuggestions(errorType: ErrorType, options: DisplayOptions): string {
  const lines = getSuggestions(errorType).map((suggestion, i) =>
    formatSuggestion(suggestion, i + 1, options)
  );
  return `\n\n${paint('Suggestions:', 1, options)}\n${lines.join('\n')}`;
}

/**
 * Formats a build failure: the tool's stderr first, then the `Error:` line
 * with its context, then suggestions for its kind.
 *
 * @param error - The build failure.
 * @param options - Display options.
 * @returns The text to print on stderr.
 */
export function formatBuildError(
  error: BuildError,
  options: DisplayOptions = { colors: false }
): string {
  const label = (text: string): string => paint(text, 33, options);
  let result = '';

  const stderr = error.stderr?.trim() ?? '';
  if (stderr.length > 0) {
    result += `${stderr}\n\n`;
  }

  result += `${paint('Error:', 31, options)} ${error.message}`;
  result += `\n  ${label('Step:')} ${error.step}`;

  if (error.command !== undefined) {
    result += `\n  ${label('Command:')} ${error.command}`;
  }
  if (error.exitCode !== undefined) {
    result += `\n  ${label('Exit code:')} ${String(error.exitCode)}`;
  }
  if (error.filePath !== undefined) {
    result += `\n  ${label('File:')} ${error.filePath}`;
    if (error.line !== undefined) {
      result += `:${String(error.line)}`;
    }
  }
  if (error.details !== undefined && error.details.length > 0) {
    const heading = error.kind === 'load_verification' ? 'Failed:' : 'Details:';
    result += `\n  ${label(heading)} ${error.details.join(', ')}`;
  }

  return result + formatSuggestions(error.kind, options);
}

/**
 * Formats a configuration error with configuration suggestions.
 *
 * @param error - A ConfigParseError, ConfigValidationError or EnvCoercionError.
 * @param options - Display options.
 */
export function formatConfigError(
  error: Error,
  options: DisplayOptions = { colors: false }
): string {
  return `${paint('Error:', 31, options)} ${error.message}` + formatSuggestions('configuration', options);
}
