/**
 * Rewrite rule table.
 *
 * Each generation unit owns one namespace prefix. Imports through an owned
 * prefix are rewritten to sibling imports of the generated package; every
 * other import is left alone.
 *
 * @packageDocumentation
 */

import type { GenerationUnit } from '../config/types.js';

/** Suffix the Python generator appends to each module name. */
export const GENERATED_MODULE_SUFFIX = '_pb2';

/** File name suffix of a generated module. */
export const GENERATED_FILE_SUFFIX = `${GENERATED_MODULE_SUFFIX}.py`;

/**
 * One entry of the rewrite table.
 */
export interface RewriteRule {
  /** Dotted namespace, e.g. `google.bigtable.v1`. */
  readonly prefix: string;
  /**
   * Modules under `prefix` that were generated locally. When undefined,
   * every generated module under the prefix is owned.
   */
  readonly modules?: readonly string[];
}

/**
 * Where rewritten imports point.
 */
export type RewriteTarget =
  | { readonly style: 'relative' }
  | { readonly style: 'absolute'; readonly packageName: string };

/**
 * Converts a proto namespace directory to its dotted module prefix.
 *
 * @param protoDir - e.g. `google/bigtable/v1`
 * @returns e.g. `google.bigtable.v1`
 */
export function prefixForProtoDir(protoDir: string): string {
  return protoDir
    .split(/[\\/]+/)
    .filter((segment) => segment.length > 0 && segment !== '.')
    .join('.');
}

/**
 * Name of the module the Python generator emits for a `.proto` file.
 *
 * @param protoFile - e.g. `empty.proto` or `google/api/http.proto`
 * @returns e.g. `empty_pb2`
 */
export function generatedModuleName(protoFile: string): string {
  const base = protoFile.split(/[\\/]/).pop() ?? protoFile;
  const stem = base.endsWith('.proto') ? base.slice(0, -'.proto'.length) : base;
  return stem.replace(/-/g, '_') + GENERATED_MODULE_SUFFIX;
}

/**
 * Builds the rewrite table from the generation units, one rule per unit.
 *
 * @param units - The configured generation units.
 * @returns The rules, in unit order.
 */
export function rulesForUnits(units: readonly GenerationUnit[]): RewriteRule[] {
  return units.map((unit) => {
    const prefix = prefixForProtoDir(unit.proto_dir);
    return unit.files === undefined
      ? { prefix }
      : { prefix, modules: unit.files.map((file) => generatedModuleName(file)) };
  });
}

/**
 * Whether a dotted module path lies at or under a prefix, on a dot boundary.
 *
 * @example
 * ```typescript
 * matchesPrefix('google.api.http_pb2', 'google.api'); // true
 * matchesPrefix('google.apis', 'google.api'); // false
 * ```
 */
export function matchesPrefix(modulePath: string, prefix: string): boolean {
  return modulePath === prefix || modulePath.startsWith(`${prefix}.`);
}

/**
 * Qualified name used in a rewritten `from` clause.
 *
 * @param target - Rewrite target.
 * @param module - Sibling module, when importing from inside it.
 * @returns `.`, `.module`, `pkg` or `pkg.module`.
 */
export function qualifyModule(target: RewriteTarget, module?: string): string {
  if (target.style === 'relative') {
    return module === undefined ? '.' : `.${module}`;
  }
  return module === undefined ? target.packageName : `${target.packageName}.${module}`;
}

/**
 * How a dotted module path relates to the rewrite table.
 */
export type Ownership =
  | { readonly kind: 'foreign' }
  | { readonly kind: 'namespace'; readonly rule: RewriteRule }
  | { readonly kind: 'module'; readonly rule: RewriteRule; readonly module: string }
  | { readonly kind: 'unexpected'; readonly rule: RewriteRule; readonly reason: string };

/**
 * Whether a rule owns a module name directly under its prefix.
 *
 * @param rule - The rule.
 * @param module - Bare module name.
 */
export function ownsModule(rule: RewriteRule, module: string): boolean {
  if (rule.modules !== undefined) {
    return rule.modules.includes(module);
  }
  return module.endsWith(GENERATED_MODULE_SUFFIX);
}

/**
 * Classifies a dotted module path against the rewrite table. The longest
 * matching prefix wins.
 *
 * - `foreign`: no rule applies (including unowned modules under a
 *   restricted prefix, such as the protobuf runtime)
 * - `namespace`: the path is exactly a rule's prefix
 * - `module`: the path names one owned module directly under a prefix
 * - `unexpected`: the path is under an owned prefix but has a shape that
 *   cannot be flattened
 *
 * @param modulePath - Dotted module path from an import statement.
 * @param rules - The rewrite table.
 */
export function classifyModulePath(modulePath: string, rules: readonly RewriteRule[]): Ownership {
  let rule: RewriteRule | undefined;
  for (const candidate of rules) {
    if (
      matchesPrefix(modulePath, candidate.prefix) &&
      (rule === undefined || candidate.prefix.length > rule.prefix.length)
    ) {
      rule = candidate;
    }
  }

  if (rule === undefined) {
    return { kind: 'foreign' };
  }
  if (modulePath === rule.prefix) {
    return { kind: 'namespace', rule };
  }

  const segments = modulePath.slice(rule.prefix.length + 1).split('.');
  const [first = '', ...nested] = segments;

  if (rule.modules !== undefined && !rule.modules.includes(first)) {
    return { kind: 'foreign' };
  }
  if (nested.length > 0) {
    return {
      kind: 'unexpected',
      rule,
      reason: `'${modulePath}' is nested more than one level below '${rule.prefix}'`,
    };
  }
  if (!ownsModule(rule, first)) {
    return {
      kind: 'unexpected',
      rule,
      reason: `'${modulePath}' is not a generated module under '${rule.prefix}'`,
    };
  }
  return { kind: 'module', rule, module: first };
}
