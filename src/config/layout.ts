/**
 * Resolves configured relative paths against the project root.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { RewriteTarget } from '../rewrite/rules.js';
import type { Config } from './types.js';

/**
 * Absolute locations of one project, derived from its configuration.
 */
export interface ProjectLayout {
  /** Project root: the config file's directory. */
  readonly root: string;
  /** Checkout of the proto repository. */
  readonly checkoutDir: string;
  /** Directory `.proto` import paths are relative to. */
  readonly protoRoot: string;
  /** Compiler output directory. */
  readonly scratchDir: string;
  /** Flat package directory. */
  readonly packageDir: string;
  /** Dotted name of the package directory. */
  readonly packageName: string;
}

/**
 * Derives a dotted package name from a package directory path.
 *
 * @example
 * ```typescript
 * packageNameFromDir('gcloud_bigtable/_generated'); // 'gcloud_bigtable._generated'
 * ```
 */
export function packageNameFromDir(packageDir: string): string {
  return packageDir
    .split(/[\\/]+/)
    .filter((segment) => segment.length > 0 && segment !== '.')
    .join('.');
}

/**
 * Dotted package name in effect: `rewrite.package` when set, otherwise
 * derived from `paths.package_dir`.
 */
export function effectivePackageName(config: Config): string {
  return config.rewrite.package ?? packageNameFromDir(config.paths.package_dir);
}

/**
 * Resolves every configured directory against the project root.
 *
 * @param config - A validated configuration.
 * @param root - Absolute project root.
 */
export function resolveProject(config: Config, root: string): ProjectLayout {
  const checkoutDir = path.resolve(root, config.repository.checkout_dir);
  return {
    root,
    checkoutDir,
    protoRoot: path.resolve(checkoutDir, config.repository.proto_root),
    scratchDir: path.resolve(root, config.paths.scratch_dir),
    packageDir: path.resolve(root, config.paths.package_dir),
    packageName: effectivePackageName(config),
  };
}

/**
 * The rewrite target for a project.
 */
export function rewriteTargetFor(config: Config, layout: ProjectLayout): RewriteTarget {
  return config.rewrite.style === 'relative'
    ? { style: 'relative' }
    : { style: 'absolute', packageName: layout.packageName };
}
