/**
 * Check command handler: load-verifies every generated module.
 */

import { runVerification, type ProbeOutcome } from '../../verify/probe.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { paint } from '../utils/displayUtils.js';
import { reportBuildFailure } from '../utils/errorHandling.js';

function formatOutcome(outcome: ProbeOutcome, context: CliContext): string {
  const status = outcome.passed
    ? paint('ok  ', 32, context.display)
    : paint('FAIL', 31, context.display);
  return `  ${status} ${outcome.probe.name}`;
}

/**
 * Handles the check_generate command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const { config, layout, runner, logger } = context;

  context.out(`==> Checking ${layout.packageName}`);
  const result = await runVerification({
    verify: config.verify,
    layout,
    runner,
    logger: logger.child('verify'),
    onProbe: (outcome) => context.out(formatOutcome(outcome, context)),
  });
  if (!result.success) {
    return reportBuildFailure(context, result.error);
  }

  context.out(`All ${String(result.value.outcomes.length)} load probes passed`);
  return { exitCode: 0 };
}
