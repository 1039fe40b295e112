/**
 * Path display helpers shared by command handlers.
 */

import * as path from 'node:path';

/**
 * Shows a path relative to the project root, or `.` for the root itself.
 */
export function displayPath(root: string, target: string): string {
  const relative = path.relative(root, target);
  return relative === '' ? '.' : relative;
}
