/**
 * Application wiring for the protostub CLI: global options, configuration
 * loading and the command context.
 */

/* eslint-disable no-console */
import { loadConfig, type EnvRecord } from '../config/index.js';
import { resolveProject } from '../config/layout.js';
import { createCommandRunner } from '../toolchain/process.js';
import type { CommandRunner } from '../toolchain/types.js';
import { createLogger } from '../utils/logger.js';
import { formatConfigError, isConfigurationError } from './errors.js';
import type { CliCommandHandler, CliCommandResult, CliContext, LineWriter } from './types.js';
import { shouldUseColors, type DisplayOptions } from './utils/displayUtils.js';

/**
 * Error class for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Global options recognised by every command.
 */
export interface ParsedCliArgs {
  /** Value of `--config`. */
  configPath: string | undefined;
  /** Whether `--verbose` was given. */
  verbose: boolean;
}

/**
 * Options for {@link createCliApp}. Everything defaults to the real process.
 */
export interface CreateCliAppOptions {
  /** Command arguments, after the command name. */
  args?: readonly string[];
  /** Working directory. */
  cwd?: string;
  /** Environment for overrides and color detection. */
  env?: EnvRecord;
  /** Process runner; execa when omitted. */
  runner?: CommandRunner;
  /** Writer for progress and summary lines. */
  stdout?: LineWriter;
  /** Writer for error reports. */
  stderr?: LineWriter;
  /** Forces colors on or off. */
  colors?: boolean;
  /** Destination of structured log entries; stderr when omitted. */
  logSink?: (line: string) => void;
}

/**
 * Parses a command's arguments. Only `--config <path>` and `--verbose` are
 * accepted; commands take no positional arguments.
 *
 * @param args - Arguments after the command name.
 * @returns The global options.
 * @throws CliUsageError for `--config` without a value, an unknown option
 *   or a positional argument.
 */
export function parseCliArgs(args: readonly string[]): ParsedCliArgs {
  const parsed: ParsedCliArgs = { configPath: undefined, verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--verbose') {
      parsed.verbose = true;
    } else if (arg === '--config') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError('--config requires a path');
      }
      parsed.configPath = value;
      i++;
    } else if (arg.startsWith('--config=')) {
      parsed.configPath = arg.slice('--config='.length);
      if (parsed.configPath === '') {
        throw new CliUsageError('--config requires a path');
      }
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      throw new CliUsageError(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

function resolveDisplay(options: CreateCliAppOptions): DisplayOptions {
  return {
    colors: options.colors ?? shouldUseColors(process.stderr, options.env ?? process.env),
  };
}

/**
 * Creates and initializes the CLI application context.
 *
 * @param options - Arguments, environment and output overrides.
 * @returns The command context.
 * @throws CliUsageError for malformed arguments.
 * @throws ConfigParseError, EnvCoercionError or ConfigValidationError for
 *   configuration problems.
 */
export function createCliApp(options: CreateCliAppOptions = {}): CliContext {
  const parsed = parseCliArgs(options.args ?? []);
  const loaded = loadConfig({
    ...(parsed.configPath === undefined ? {} : { configPath: parsed.configPath }),
    ...(options.cwd === undefined ? {} : { cwd: options.cwd }),
    ...(options.env === undefined ? {} : { env: options.env }),
  });

  const logger = createLogger(parsed.verbose || loaded.config.logging.debug, options.logSink);
  logger.debug('config_loaded', {
    configPath: loaded.configPath ?? null,
    root: loaded.root,
    envOverrides: loaded.appliedEnvVars,
  });

  return {
    config: loaded.config,
    layout: resolveProject(loaded.config, loaded.root),
    logger,
    runner: options.runner ?? createCommandRunner(),
    display: resolveDisplay(options),
    out: options.stdout ?? ((line: string): void => console.log(line)),
    err: options.stderr ?? ((line: string): void => console.error(line)),
  };
}

/**
 * Builds the context and runs a command. Usage and configuration errors are
 * reported on stderr and give exit code 1.
 *
 * @param handler - The command handler.
 * @param options - Options for {@link createCliApp}.
 * @returns The command result.
 */
export async function runCliCommand(
  handler: CliCommandHandler,
  options: CreateCliAppOptions = {}
): Promise<CliCommandResult> {
  let context: CliContext;
  try {
    context = createCliApp(options);
  } catch (error) {
    const err = options.stderr ?? ((line: string): void => console.error(line));
    if (error instanceof CliUsageError) {
      err(`Error: ${error.message}`);
      return { exitCode: 1, message: error.message };
    }
    if (isConfigurationError(error)) {
      err(formatConfigError(error, resolveDisplay(options)));
      return { exitCode: 1, message: error.message };
    }
    throw error;
  }

  return handler(context);
}
