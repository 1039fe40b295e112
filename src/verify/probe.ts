/**
 * Load verification: imports the package and each generated module in a
 * fresh interpreter process.
 *
 * @packageDocumentation
 */

import type { ProjectLayout } from '../config/layout.js';
import type { VerifyConfig } from '../config/types.js';
import { GENERATED_FILE_SUFFIX } from '../rewrite/rules.js';
import type { Logger } from '../utils/logger.js';
import { safeExists, safeListFiles } from '../utils/safe-fs.js';
import {
  commandFailure,
  createFailureResult,
  createSuccessResult,
  filesystemFailure,
  type CommandRunner,
  type StepResult,
} from '../toolchain/types.js';

/**
 * One import check.
 */
export interface Probe {
  /** Dotted name being imported. */
  readonly name: string;
  /** Interpreter source passed with `-c`. */
  readonly code: string;
}

/**
 * Result of running one probe.
 */
export interface ProbeOutcome {
  readonly probe: Probe;
  readonly passed: boolean;
  readonly exitCode: number | undefined;
  readonly stderr: string;
}

/**
 * Inputs of {@link runVerification}.
 */
export interface VerifyOptions {
  readonly verify: VerifyConfig;
  readonly layout: ProjectLayout;
  readonly runner: CommandRunner;
  readonly logger: Logger;
  /** Called after each probe completes. */
  readonly onProbe?: (outcome: ProbeOutcome) => void;
}

/**
 * Outcome of a verification run in which every probe passed.
 */
export interface VerifySummary {
  readonly outcomes: readonly ProbeOutcome[];
}

/**
 * Builds the probe set: the package first, then one probe per module.
 *
 * @example
 * ```typescript
 * buildProbes('pkg._generated', ['http_pb2']);
 * // [
 * //   { name: 'pkg._generated', code: 'import pkg._generated' },
 * //   { name: 'pkg._generated.http_pb2', code: 'from pkg._generated import http_pb2' },
 * // ]
 * ```
 */
export function buildProbes(packageName: string, modules: readonly string[]): Probe[] {
  return [
    { name: packageName, code: `import ${packageName}` },
    ...modules.map((module) => ({
      name: `${packageName}.${module}`,
      code: `from ${packageName} import ${module}`,
    })),
  ];
}

/**
 * Lists the generated modules present in the package directory, sorted.
 *
 * @returns Module names without the `.py` extension.
 */
export async function discoverModules(packageDir: string): Promise<string[]> {
  const names = await safeListFiles(packageDir);
  return names
    .filter((name) => name.endsWith(GENERATED_FILE_SUFFIX))
    .map((name) => name.slice(0, -'.py'.length));
}

/**
 * Runs every probe, one interpreter process at a time, from the project
 * root.
 *
 * Every probe runs even after one fails. The result is a
 * `load_verification` failure naming the failed probes if any failed, and
 * `unreachable_dependency` as soon as the interpreter cannot be started.
 */
export async function runVerification(options: VerifyOptions): Promise<StepResult<VerifySummary>> {
  const { verify, layout, runner, logger } = options;

  let modules: string[];
  if (verify.modules.length > 0) {
    modules = [...verify.modules];
  } else {
    try {
      modules = (await safeExists(layout.packageDir)) ? await discoverModules(layout.packageDir) : [];
    } catch (error) {
      return filesystemFailure('verify', error, layout.packageDir);
    }
  }

  if (modules.length === 0) {
    return createFailureResult({
      kind: 'load_verification',
      step: 'verify',
      message: `No generated modules found in ${layout.packageDir}`,
      filePath: layout.packageDir,
    });
  }

  const outcomes: ProbeOutcome[] = [];
  for (const probe of buildProbes(layout.packageName, modules)) {
    const output = await runner.run(verify.interpreter, ['-c', probe.code], { cwd: layout.root });

    if (output.exitCode === undefined) {
      logger.error('interpreter_unavailable', { command: output.command });
      return commandFailure(
        'unreachable_dependency',
        'verify',
        `Could not run ${verify.interpreter}`,
        output
      );
    }

    const outcome: ProbeOutcome = {
      probe,
      passed: output.exitCode === 0,
      exitCode: output.exitCode,
      stderr: output.stderr,
    };
    outcomes.push(outcome);
    options.onProbe?.(outcome);

    if (outcome.passed) {
      logger.debug('probe_passed', { probe: probe.name });
    } else {
      logger.warn('probe_failed', { probe: probe.name, exitCode: output.exitCode });
    }
  }

  const failed = outcomes.filter((outcome) => !outcome.passed);
  if (failed.length > 0) {
    return createFailureResult({
      kind: 'load_verification',
      step: 'verify',
      message: `${String(failed.length)} of ${String(outcomes.length)} load probes failed`,
      details: failed.map((outcome) => outcome.probe.name),
      stderr: failed
        .map((outcome) => outcome.stderr.trim())
        .filter((text) => text.length > 0)
        .join('\n'),
    });
  }

  logger.info('verification_passed', { probes: outcomes.length });
  return createSuccessResult({ outcomes });
}
