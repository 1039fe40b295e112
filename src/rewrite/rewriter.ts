/**
 * Applies the import rewrite to every generated module in the package
 * directory.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { Logger } from '../utils/logger.js';
import { safeListFiles, safeReadTextFile, safeWriteTextFile } from '../utils/safe-fs.js';
import {
  createFailureResult,
  createSuccessResult,
  filesystemFailure,
  type StepResult,
} from '../toolchain/types.js';
import { GENERATED_FILE_SUFFIX, type RewriteRule, type RewriteTarget } from './rules.js';
import { transformSource } from './transform.js';

/**
 * Inputs of the rewrite step.
 */
export interface RewritePackageOptions {
  /** Absolute path of the flat package directory. */
  readonly packageDir: string;
  /** The rewrite table. */
  readonly rules: readonly RewriteRule[];
  /** Where rewritten imports point. */
  readonly target: RewriteTarget;
  readonly logger: Logger;
}

/**
 * Summary of a successful rewrite.
 */
export interface RewriteSummary {
  /** Generated module file names that were examined. */
  readonly filesScanned: readonly string[];
  /** File names whose content changed and was written back. */
  readonly filesChanged: readonly string[];
  /** Total number of import lines rewritten. */
  readonly linesRewritten: number;
}

interface PendingWrite {
  readonly fileName: string;
  readonly content: string;
}

/**
 * Rewrites the imports of every `*_pb2.py` file directly in the package
 * directory.
 *
 * All files are transformed in memory before any is written, so a
 * mismatch in one file leaves every file untouched.
 *
 * @param options - Package directory, rules and target.
 * @returns The rewrite summary, or a `rewrite_mismatch` failure naming the
 *   file and line.
 */
export async function rewritePackage(
  options: RewritePackageOptions
): Promise<StepResult<RewriteSummary>> {
  const { packageDir, rules, target, logger } = options;

  let fileNames: string[];
  try {
    fileNames = (await safeListFiles(packageDir)).filter((name) =>
      name.endsWith(GENERATED_FILE_SUFFIX)
    );
  } catch (error) {
    return filesystemFailure('rewrite', error, packageDir);
  }

  const pending: PendingWrite[] = [];
  let linesRewritten = 0;

  for (const fileName of fileNames) {
    const filePath = path.join(packageDir, fileName);

    let content: string;
    try {
      content = await safeReadTextFile(filePath);
    } catch (error) {
      return filesystemFailure('rewrite', error, filePath);
    }

    const result = transformSource(content, rules, target);
    if (!result.success) {
      logger.error('rewrite_mismatch', { file: filePath, line: result.line, text: result.text });
      return createFailureResult({
        kind: 'rewrite_mismatch',
        step: 'rewrite',
        message: `${fileName}:${String(result.line)}: ${result.reason}`,
        filePath,
        line: result.line,
        details: [result.text],
      });
    }

    logger.debug('file_scanned', { file: fileName, rewrittenLines: result.rewrittenLines });
    if (result.content !== content) {
      pending.push({ fileName, content: result.content });
      linesRewritten += result.rewrittenLines;
    }
  }

  for (const write of pending) {
    const filePath = path.join(packageDir, write.fileName);
    try {
      await safeWriteTextFile(filePath, write.content);
    } catch (error) {
      return filesystemFailure('rewrite', error, filePath);
    }
  }

  const summary: RewriteSummary = {
    filesScanned: fileNames,
    filesChanged: pending.map((write) => write.fileName),
    linesRewritten,
  };
  logger.info('package_rewritten', {
    packageDir,
    scanned: summary.filesScanned.length,
    changed: summary.filesChanged.length,
    linesRewritten,
  });

  return createSuccessResult(summary);
}
