/**
 * Clones or updates the proto source repository.
 *
 * @packageDocumentation
 */

import type { ProjectLayout } from '../config/layout.js';
import type { RepositoryConfig } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import { safeExists } from '../utils/safe-fs.js';
import {
  commandFailure,
  createFailureResult,
  createSuccessResult,
  filesystemFailure,
  type CommandRunner,
  type StepResult,
} from '../toolchain/types.js';

/** Version control executable. */
export const GIT_EXECUTABLE = 'git';

/**
 * Inputs of the fetch step.
 */
export interface FetchOptions {
  readonly repository: RepositoryConfig;
  readonly layout: ProjectLayout;
  readonly runner: CommandRunner;
  readonly logger: Logger;
}

/**
 * What the fetch step did.
 */
export interface FetchSummary {
  /** Whether a fresh clone was made. */
  readonly cloned: boolean;
  /** Directory `.proto` import paths are relative to. */
  readonly protoRoot: string;
}

/**
 * Clones the repository if its checkout is absent, then pulls the
 * configured branch. Afterwards the proto root must exist.
 *
 * Every failure is `unreachable_dependency`: git is missing, the remote
 * cannot be reached, or the checkout does not hold the expected tree.
 */
export async function fetchProtos(options: FetchOptions): Promise<StepResult<FetchSummary>> {
  const { repository, layout, runner, logger } = options;

  let present: boolean;
  try {
    present = await safeExists(layout.checkoutDir);
  } catch (error) {
    return filesystemFailure('fetch', error, layout.checkoutDir);
  }

  if (!present) {
    logger.info('checkout_cloning', { url: repository.url, checkoutDir: layout.checkoutDir });
    const clone = await runner.run(GIT_EXECUTABLE, ['clone', repository.url, layout.checkoutDir], {
      cwd: layout.root,
    });
    if (clone.exitCode !== 0) {
      logger.error('checkout_clone_failed', { command: clone.command, exitCode: clone.exitCode });
      return commandFailure(
        'unreachable_dependency',
        'fetch',
        `Could not clone ${repository.url}`,
        clone
      );
    }
  }

  logger.info('checkout_pulling', { remote: repository.remote, branch: repository.branch });
  const pull = await runner.run(GIT_EXECUTABLE, ['pull', repository.remote, repository.branch], {
    cwd: layout.checkoutDir,
  });
  if (pull.exitCode !== 0) {
    logger.error('checkout_pull_failed', { command: pull.command, exitCode: pull.exitCode });
    return commandFailure(
      'unreachable_dependency',
      'fetch',
      `Could not pull ${repository.remote}/${repository.branch} into ${layout.checkoutDir}`,
      pull
    );
  }
  logger.debug('checkout_pulled', { stdout: pull.stdout });

  let rootPresent: boolean;
  try {
    rootPresent = await safeExists(layout.protoRoot);
  } catch (error) {
    return filesystemFailure('fetch', error, layout.protoRoot);
  }
  if (!rootPresent) {
    return createFailureResult({
      kind: 'unreachable_dependency',
      step: 'fetch',
      message: `Proto root not found in checkout: ${layout.protoRoot}`,
      filePath: layout.protoRoot,
    });
  }

  return createSuccessResult({ cloned: !present, protoRoot: layout.protoRoot });
}
