/**
 * Runs the protocol compiler for one generation unit.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { ProjectLayout } from '../config/layout.js';
import type { CompilerConfig, GenerationUnit } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import { safeExists, safeListFiles, safeMkdirp } from '../utils/safe-fs.js';
import {
  commandFailure,
  createFailureResult,
  createSuccessResult,
  filesystemFailure,
  type CommandRunner,
  type StepResult,
} from '../toolchain/types.js';

/**
 * Inputs of the compile step.
 */
export interface CompileOptions {
  readonly unit: GenerationUnit;
  readonly layout: ProjectLayout;
  readonly compiler: CompilerConfig;
  readonly runner: CommandRunner;
  readonly logger: Logger;
}

/**
 * What the compiler was asked to build.
 */
export interface CompileSummary {
  /** Proto files passed to the compiler, relative to the proto root. */
  readonly protoFiles: readonly string[];
  /** Scratch subdirectory the unit's modules were written to. */
  readonly outputDir: string;
}

/**
 * Normalises a unit directory to forward slashes with no empty or `.`
 * segments, as the compiler expects import-relative paths.
 */
export function unitDirectory(unit: GenerationUnit): string {
  return unit.proto_dir
    .split(/[\\/]+/)
    .filter((segment) => segment.length > 0 && segment !== '.')
    .join('/');
}

/**
 * Lists the `.proto` files a unit selects, relative to the proto root.
 * Units with `files` select exactly those; others select every `.proto`
 * directly in their directory, sorted.
 */
export async function selectProtoFiles(
  unit: GenerationUnit,
  protoRoot: string
): Promise<string[]> {
  const dir = unitDirectory(unit);
  if (unit.files !== undefined) {
    return unit.files.map((file) => `${dir}/${file}`);
  }

  const absoluteDir = path.join(protoRoot, dir);
  if (!(await safeExists(absoluteDir))) {
    return [];
  }
  const names = await safeListFiles(absoluteDir);
  return names.filter((name) => name.endsWith('.proto')).map((name) => `${dir}/${name}`);
}

/**
 * Compiles one unit into the scratch directory.
 *
 * Runs `<compiler> <files...> --python_out=<scratch> [extra args]` from the
 * proto root. A unit selecting no files, or a non-zero compiler exit, is a
 * `compilation` failure; a compiler that cannot be started is
 * `unreachable_dependency`.
 */
export async function compileUnit(options: CompileOptions): Promise<StepResult<CompileSummary>> {
  const { unit, layout, compiler, runner, logger } = options;

  let protoFiles: string[];
  try {
    await safeMkdirp(layout.scratchDir);
    protoFiles = await selectProtoFiles(unit, layout.protoRoot);
  } catch (error) {
    return filesystemFailure('compile', error, layout.scratchDir);
  }

  if (protoFiles.length === 0) {
    return createFailureResult({
      kind: 'compilation',
      step: 'compile',
      message: `No .proto files found in ${unit.proto_dir}`,
      filePath: path.join(layout.protoRoot, unitDirectory(unit)),
    });
  }

  const args = [...protoFiles, `--python_out=${layout.scratchDir}`, ...compiler.extra_args];
  logger.info('unit_compiling', { protoDir: unit.proto_dir, files: protoFiles.length });
  const output = await runner.run(compiler.executable, args, { cwd: layout.protoRoot });

  if (output.exitCode === undefined) {
    logger.error('compiler_unavailable', { command: output.command });
    return commandFailure(
      'unreachable_dependency',
      'compile',
      `Could not run ${compiler.executable}`,
      output
    );
  }
  if (output.exitCode !== 0) {
    logger.error('unit_compile_failed', { protoDir: unit.proto_dir, exitCode: output.exitCode });
    return commandFailure(
      'compilation',
      'compile',
      `${compiler.executable} failed for ${unit.proto_dir} (exit code ${String(output.exitCode)})`,
      output
    );
  }

  return createSuccessResult({
    protoFiles,
    outputDir: path.join(layout.scratchDir, unitDirectory(unit)),
  });
}
