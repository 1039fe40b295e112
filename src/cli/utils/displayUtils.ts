/**
 * Shared display utilities for CLI commands.
 */

export interface DisplayOptions {
  colors: boolean;
}

/**
 * Stream properties that decide whether colors are used.
 */
export interface TerminalStream {
  isTTY?: boolean;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Colors are used only on a terminal and only when `NO_COLOR` is unset.
 *
 * @param stream - The output stream.
 * @param env - The environment.
 */
export function shouldUseColors(
  stream: TerminalStream,
  env: Record<string, string | undefined>
): boolean {
  return stream.isTTY === true && env.NO_COLOR === undefined;
}

/**
 * Wraps text in an ANSI style when colors are on.
 */
export function paint(text: string, code: number, options: DisplayOptions): string {
  return options.colors ? `\x1b[${String(code)}m${text}\x1b[0m` : text;
}

/**
 * Strips ANSI escape sequences from a string.
 *
 * @param str - The string potentially containing ANSI codes.
 * @returns The string with ANSI codes removed.
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}
