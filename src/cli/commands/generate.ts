/**
 * Generate command handler: fetch, compile, relocate and rewrite.
 */

import { runGenerate } from '../../generate/pipeline.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { reportBuildFailure } from '../utils/errorHandling.js';
import { displayPath } from './paths.js';

/**
 * Handles the generate command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleGenerateCommand(context: CliContext): Promise<CliCommandResult> {
  const { config, layout, runner, logger } = context;

  const result = await runGenerate({
    config,
    layout,
    runner,
    logger,
    onProgress: (message) => context.out(`==> ${message}`),
  });
  if (!result.success) {
    return reportBuildFailure(context, result.error);
  }

  const { units, rewrite } = result.value;
  const modules = units.reduce((total, unit) => total + unit.moved.length, 0);
  context.out(
    `Generated ${String(modules)} modules from ${String(units.length)} units in ${displayPath(layout.root, layout.packageDir)}`
  );
  context.out(
    `Rewrote ${String(rewrite.linesRewritten)} imports in ${String(rewrite.filesChanged.length)} files`
  );
  return { exitCode: 0 };
}
