/**
 * External process execution via execa.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { CommandOptions, CommandOutput, CommandRunner } from './types.js';

/**
 * Formats a command line for messages.
 *
 * @param file - Executable.
 * @param args - Arguments.
 * @returns The space-joined command line.
 */
export function formatCommand(file: string, args: readonly string[]): string {
  return [file, ...args].join(' ');
}

/**
 * Describes why a process could not be started.
 */
function describeSpawnFailure(file: string, error: Error): string {
  if ('code' in error && error.code === 'ENOENT') {
    return `${file}: command not found. Please ensure it is installed and on PATH.`;
  }
  return error.message;
}

/**
 * {@link CommandRunner} backed by execa. Output is captured rather than
 * inherited so that failures can be reported with the tool's stderr.
 */
export class ExecaCommandRunner implements CommandRunner {
  async run(
    file: string,
    args: readonly string[],
    options: CommandOptions
  ): Promise<CommandOutput> {
    const command = formatCommand(file, args);

    try {
      const result = await execa(file, args, {
        cwd: options.cwd,
        reject: false,
      });

      if (result.exitCode === undefined) {
        return {
          command,
          exitCode: undefined,
          stdout: result.stdout,
          stderr:
            result instanceof Error
              ? describeSpawnFailure(file, result)
              : `${file}: process did not start`,
        };
      }

      return {
        command,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    } catch (error) {
      return {
        command,
        exitCode: undefined,
        stdout: '',
        stderr: error instanceof Error ? describeSpawnFailure(file, error) : String(error),
      };
    }
  }
}

/**
 * Creates the default command runner.
 *
 * @returns An execa-backed runner.
 */
export function createCommandRunner(): CommandRunner {
  return new ExecaCommandRunner();
}
