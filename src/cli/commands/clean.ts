/**
 * Clean command handler.
 */

import { cleanProject } from '../../clean/clean.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { reportBuildFailure } from '../utils/errorHandling.js';
import { displayPath } from './paths.js';

/**
 * Handles the clean command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleCleanCommand(context: CliContext): Promise<CliCommandResult> {
  const { layout, logger } = context;

  const result = await cleanProject(layout, logger.child('clean'));
  if (!result.success) {
    return reportBuildFailure(context, result.error);
  }

  if (result.value.removed.length === 0) {
    context.out('Nothing to clean');
  }
  for (const dir of result.value.removed) {
    context.out(`Removed ${displayPath(layout.root, dir)}`);
  }
  return { exitCode: 0 };
}
