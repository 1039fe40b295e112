/**
 * Rewrite command handler: re-runs import rewriting on the package
 * directory without fetching or compiling.
 */

import { rewriteProject } from '../../generate/pipeline.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { reportBuildFailure } from '../utils/errorHandling.js';
import { displayPath } from './paths.js';

/**
 * Handles the rewrite command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleRewriteCommand(context: CliContext): Promise<CliCommandResult> {
  const { config, layout, logger } = context;

  context.out(`==> Rewriting imports in ${displayPath(layout.root, layout.packageDir)}`);
  const result = await rewriteProject({ config, layout, logger });
  if (!result.success) {
    return reportBuildFailure(context, result.error);
  }

  const { filesScanned, filesChanged, linesRewritten } = result.value;
  context.out(
    `Rewrote ${String(linesRewritten)} imports in ${String(filesChanged.length)} of ${String(filesScanned.length)} files`
  );
  return { exitCode: 0 };
}
