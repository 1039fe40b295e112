/**
 * Removes the ephemeral checkout and scratch directories.
 *
 * @packageDocumentation
 */

import type { ProjectLayout } from '../config/layout.js';
import type { Logger } from '../utils/logger.js';
import { safeExists, safeRemoveTree } from '../utils/safe-fs.js';
import { createSuccessResult, filesystemFailure, type StepResult } from '../toolchain/types.js';

/**
 * What the clean step removed.
 */
export interface CleanSummary {
  /** Directories that existed and were removed. */
  readonly removed: readonly string[];
}

/**
 * Recursively removes the checkout and scratch directories. Absent paths
 * are skipped; the package directory is never touched.
 */
export async function cleanProject(
  layout: ProjectLayout,
  logger: Logger
): Promise<StepResult<CleanSummary>> {
  const removed: string[] = [];

  for (const dir of [layout.checkoutDir, layout.scratchDir]) {
    try {
      if (await safeExists(dir)) {
        await safeRemoveTree(dir);
        removed.push(dir);
        logger.info('directory_removed', { path: dir });
      } else {
        logger.debug('directory_absent', { path: dir });
      }
    } catch (error) {
      return filesystemFailure('clean', error, dir);
    }
  }

  return createSuccessResult({ removed });
}
