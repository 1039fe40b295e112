/**
 * The generate pipeline: fetch, then compile and relocate each unit in
 * order, then rewrite the package's imports.
 *
 * Steps run strictly one after another and the pipeline stops at the
 * first failure.
 *
 * @packageDocumentation
 */

import { rewriteTargetFor, type ProjectLayout } from '../config/layout.js';
import type { Config } from '../config/types.js';
import { rewritePackage, type RewriteSummary } from '../rewrite/rewriter.js';
import { rulesForUnits } from '../rewrite/rules.js';
import type { Logger } from '../utils/logger.js';
import {
  createSuccessResult,
  type CommandRunner,
  type StepResult,
} from '../toolchain/types.js';
import { compileUnit } from './compile.js';
import { fetchProtos } from './fetch.js';
import { relocateUnit } from './relocate.js';

/**
 * Inputs of {@link runGenerate}.
 */
export interface GenerateOptions {
  readonly config: Config;
  readonly layout: ProjectLayout;
  readonly runner: CommandRunner;
  readonly logger: Logger;
  /** Called with a one-line description as each step starts. */
  readonly onProgress?: (message: string) => void;
}

/**
 * Per-unit outcome.
 */
export interface UnitSummary {
  readonly protoDir: string;
  /** Proto files compiled, relative to the proto root. */
  readonly protoFiles: readonly string[];
  /** Module files moved into the package directory. */
  readonly moved: readonly string[];
}

/**
 * Outcome of a successful generate run.
 */
export interface GenerateSummary {
  /** Whether the repository was freshly cloned. */
  readonly cloned: boolean;
  readonly units: readonly UnitSummary[];
  readonly rewrite: RewriteSummary;
}

/**
 * Inputs of {@link rewriteProject}.
 */
export interface RewriteProjectOptions {
  readonly config: Config;
  readonly layout: ProjectLayout;
  readonly logger: Logger;
}

/**
 * Rewrites the package's imports using the rules derived from the
 * configured units.
 */
export async function rewriteProject(
  options: RewriteProjectOptions
): Promise<StepResult<RewriteSummary>> {
  const { config, layout, logger } = options;
  return rewritePackage({
    packageDir: layout.packageDir,
    rules: rulesForUnits(config.units),
    target: rewriteTargetFor(config, layout),
    logger: logger.child('rewrite'),
  });
}

/**
 * Runs the whole generate pipeline.
 *
 * @param options - Configuration, layout, process runner and logger.
 * @returns The run summary, or the first step failure.
 */
export async function runGenerate(options: GenerateOptions): Promise<StepResult<GenerateSummary>> {
  const { config, layout, runner, logger } = options;
  const progress = options.onProgress ?? ((): void => undefined);

  progress(`Fetching ${config.repository.url}`);
  const fetched = await fetchProtos({
    repository: config.repository,
    layout,
    runner,
    logger: logger.child('fetch'),
  });
  if (!fetched.success) {
    return fetched;
  }

  const units: UnitSummary[] = [];
  for (const unit of config.units) {
    progress(`Compiling ${unit.proto_dir}`);
    const compiled = await compileUnit({
      unit,
      layout,
      compiler: config.compiler,
      runner,
      logger: logger.child('compile'),
    });
    if (!compiled.success) {
      return compiled;
    }

    const relocated = await relocateUnit({ unit, layout, logger: logger.child('relocate') });
    if (!relocated.success) {
      return relocated;
    }

    units.push({
      protoDir: unit.proto_dir,
      protoFiles: compiled.value.protoFiles,
      moved: relocated.value.moved,
    });
  }

  progress(`Rewriting imports in ${layout.packageDir}`);
  const rewritten = await rewriteProject({ config, layout, logger });
  if (!rewritten.success) {
    return rewritten;
  }

  logger.info('generate_complete', {
    units: units.length,
    modules: units.reduce((total, unit) => total + unit.moved.length, 0),
  });
  return createSuccessResult({
    cloned: fetched.value.cloned,
    units,
    rewrite: rewritten.value,
  });
}
