/**
 * Version command handler for the protostub CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

/* eslint-disable no-console */
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliCommandResult, LineWriter } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function isVersionRecord(value: unknown): value is { version: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'version' in value &&
    typeof value.version === 'string'
  );
}

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  try {
    const packageJsonPath = join(__dirname, '../../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isVersionRecord(packageJson) ? packageJson.version : '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 *
 * @param out - Writer for the version line.
 * @returns The command result.
 */
export function handleVersionCommand(
  out: LineWriter = (line) => console.log(line)
): CliCommandResult {
  out(`protostub v${getVersionFromPackageJson()}`);
  return { exitCode: 0 };
}
