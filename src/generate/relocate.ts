/**
 * Moves a unit's generated modules from the scratch tree into the flat
 * package directory.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { ProjectLayout } from '../config/layout.js';
import type { GenerationUnit } from '../config/types.js';
import { generatedModuleName } from '../rewrite/rules.js';
import type { Logger } from '../utils/logger.js';
import {
  safeExists,
  safeListFiles,
  safeMkdirp,
  safeMoveFile,
  safeWriteTextFile,
} from '../utils/safe-fs.js';
import {
  createFailureResult,
  createSuccessResult,
  filesystemFailure,
  type StepResult,
} from '../toolchain/types.js';
import { unitDirectory } from './compile.js';

/** Marker file that makes the package directory importable. */
export const PACKAGE_INIT_FILE = '__init__.py';

/**
 * Inputs of the relocation step.
 */
export interface RelocateOptions {
  readonly unit: GenerationUnit;
  readonly layout: ProjectLayout;
  readonly logger: Logger;
}

/**
 * What the relocation moved.
 */
export interface RelocateSummary {
  /** File names moved into the package directory. */
  readonly moved: readonly string[];
}

/**
 * Writes an empty `__init__.py` into the package directory unless one
 * exists. Returns whether it was created.
 */
export async function ensurePackageInit(packageDir: string): Promise<boolean> {
  const initPath = path.join(packageDir, PACKAGE_INIT_FILE);
  if (await safeExists(initPath)) {
    return false;
  }
  await safeWriteTextFile(initPath, '');
  return true;
}

/**
 * Lists what a unit should move: the generated module of each listed
 * proto, or every file the compiler left in the unit's output directory.
 * Returns the missing expected outputs separately.
 */
async function collectOutputs(
  unit: GenerationUnit,
  outputDir: string
): Promise<{ present: string[]; missing: string[] }> {
  if (unit.files !== undefined) {
    const expected = unit.files.map((file) => `${generatedModuleName(file)}.py`);
    const present: string[] = [];
    const missing: string[] = [];
    for (const name of expected) {
      if (await safeExists(path.join(outputDir, name))) {
        present.push(name);
      } else {
        missing.push(name);
      }
    }
    return { present, missing };
  }

  if (!(await safeExists(outputDir))) {
    return { present: [], missing: [] };
  }
  return { present: await safeListFiles(outputDir), missing: [] };
}

/**
 * Moves a unit's compiler output into the package directory, overwriting
 * files of the same name. Creates the package directory and its
 * `__init__.py` when missing.
 *
 * A missing expected module, or a unit that produced nothing, is a
 * `compilation` failure.
 */
export async function relocateUnit(options: RelocateOptions): Promise<StepResult<RelocateSummary>> {
  const { unit, layout, logger } = options;
  const outputDir = path.join(layout.scratchDir, unitDirectory(unit));

  let outputs: { present: string[]; missing: string[] };
  try {
    outputs = await collectOutputs(unit, outputDir);
  } catch (error) {
    return filesystemFailure('relocate', error, outputDir);
  }

  const [firstMissing] = outputs.missing;
  if (firstMissing !== undefined) {
    return createFailureResult({
      kind: 'compilation',
      step: 'relocate',
      message: `Expected compiler output not found: ${path.join(outputDir, firstMissing)}`,
      filePath: path.join(outputDir, firstMissing),
      details: outputs.missing,
    });
  }
  if (outputs.present.length === 0) {
    return createFailureResult({
      kind: 'compilation',
      step: 'relocate',
      message: `Compiler produced no output for ${unit.proto_dir}`,
      filePath: outputDir,
    });
  }

  try {
    await safeMkdirp(layout.packageDir);
  } catch (error) {
    return filesystemFailure('relocate', error, layout.packageDir);
  }

  for (const name of outputs.present) {
    const from = path.join(outputDir, name);
    try {
      await safeMoveFile(from, path.join(layout.packageDir, name));
    } catch (error) {
      return filesystemFailure('relocate', error, from);
    }
    logger.debug('module_moved', { file: name });
  }

  try {
    if (await ensurePackageInit(layout.packageDir)) {
      logger.info('package_init_created', { packageDir: layout.packageDir });
    }
  } catch (error) {
    return filesystemFailure('relocate', error, path.join(layout.packageDir, PACKAGE_INIT_FILE));
  }

  logger.info('unit_relocated', { protoDir: unit.proto_dir, moved: outputs.present.length });
  return createSuccessResult({ moved: outputs.present });
}
