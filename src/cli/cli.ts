/**
 * Command dispatch for the protostub CLI: help, version and the build
 * commands.
 */

/* eslint-disable no-console */
import { runCliCommand, type CreateCliAppOptions } from './app.js';
import { handleCheckCommand } from './commands/check.js';
import { handleCleanCommand } from './commands/clean.js';
import { handleGenerateCommand } from './commands/generate.js';
import { handleRewriteCommand } from './commands/rewrite.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';

/**
 * Process wiring for {@link runCli}; every field defaults to the real
 * process.
 */
export type CliOptions = Omit<CreateCliAppOptions, 'args'>;

const GLOBAL_OPTIONS = `
GLOBAL OPTIONS:
  --config <path>    Use this config file instead of ./protostub.toml
  --verbose          Emit debug log entries on stderr
`;

/**
 * Usage text for `protostub help`.
 */
export function helpText(): string {
  return `
protostub v${getVersionFromPackageJson()}

USAGE:
  protostub <command> [--config <path>] [--verbose]

COMMANDS:
  generate          Fetch protos, compile them and rewrite imports
  check_generate    Import every generated module (alias: check)
  rewrite           Rewrite imports in the package directory only
  clean             Remove the checkout and scratch directories
  help              Show this help message
  version           Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information
${GLOBAL_OPTIONS}
EXAMPLES:
  protostub generate                 Regenerate the package
  protostub check_generate           Verify the generated modules load
  protostub generate --verbose       Regenerate with debug logging
  protostub clean                    Remove ephemeral directories
`;
}

const COMMAND_HELP = new Map<string, string>([
  [
    'generate',
    `
USAGE: protostub generate [--config <path>] [--verbose]

Clones the proto repository (or pulls when the checkout exists), compiles
each configured unit with protoc, moves the generated modules into the
package directory and rewrites their imports to point inside it.
${GLOBAL_OPTIONS}`,
  ],
  [
    'check_generate',
    `
USAGE: protostub check_generate [--config <path>] [--verbose]

Imports the package and each generated module in a separate interpreter
process. Exits non-zero if any import fails.
${GLOBAL_OPTIONS}`,
  ],
  [
    'rewrite',
    `
USAGE: protostub rewrite [--config <path>] [--verbose]

Rewrites the imports of the modules already in the package directory.
${GLOBAL_OPTIONS}`,
  ],
  [
    'clean',
    `
USAGE: protostub clean [--config <path>] [--verbose]

Removes the checkout and scratch directories. The package directory is
left untouched.
${GLOBAL_OPTIONS}`,
  ],
]);

const COMMANDS = new Map<string, CliCommandHandler>([
  ['generate', handleGenerateCommand],
  ['check_generate', handleCheckCommand],
  ['check', handleCheckCommand],
  ['rewrite', handleRewriteCommand],
  ['clean', handleCleanCommand],
]);

/**
 * Help text for one command, with `check` resolving to `check_generate`.
 */
export function commandHelpText(commandName: string): string | undefined {
  return COMMAND_HELP.get(commandName === 'check' ? 'check_generate' : commandName);
}

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the executable, e.g. `['generate', '--verbose']`.
 * @param options - Output, environment and process-runner overrides.
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const out = options.stdout ?? ((line: string): void => console.log(line));
  const err = options.stderr ?? ((line: string): void => console.error(line));
  const command = argv[0] ?? '';
  const commandArgs = argv.slice(1);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic === undefined) {
        out(helpText());
        return 0;
      }
      const help = commandHelpText(topic);
      if (help === undefined) {
        err(`Unknown command: ${topic}`);
        err('\nRun "protostub help" to see all available commands.');
        return 1;
      }
      out(help);
      return 0;
    }

    case 'version':
    case '--version':
    case '-v':
      return handleVersionCommand(out).exitCode;

    default: {
      const handler = COMMANDS.get(command);
      if (handler === undefined) {
        err(`Error: Unknown command: ${command}`);
        err('\nRun "protostub help" for usage information.');
        return 1;
      }
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        out(commandHelpText(command) ?? helpText());
        return 0;
      }
      const result = await runCliCommand(handler, { ...options, args: commandArgs });
      return result.exitCode;
    }
  }
}
