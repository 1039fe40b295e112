/**
 * Line-oriented import rewriting for generated Python modules.
 *
 * Only the module path inside an import statement is replaced; indentation,
 * spacing, imported names, aliases and trailing comments are kept as they
 * are. The transformation is idempotent because rewritten statements name
 * the target package, which no rule prefix matches.
 *
 * @packageDocumentation
 */

import { classifyModulePath, ownsModule, qualifyModule } from './rules.js';
import type { Ownership, RewriteRule, RewriteTarget } from './rules.js';

/**
 * Outcome of transforming one line.
 */
export type LineTransform =
  | { readonly kind: 'unchanged' }
  | { readonly kind: 'rewritten'; readonly line: string }
  | { readonly kind: 'mismatch'; readonly reason: string };

/**
 * Outcome of transforming a whole file.
 */
export type SourceTransform =
  | { readonly success: true; readonly content: string; readonly rewrittenLines: number }
  | {
      readonly success: false;
      /** 1-based line number of the offending statement. */
      readonly line: number;
      readonly text: string;
      readonly reason: string;
    };

const UNCHANGED: LineTransform = { kind: 'unchanged' };

/** `from <path> import <names>`, split so the path can be swapped in place. */
const FROM_IMPORT = /^(\s*from\s+)([A-Za-z_][\w.]*)(\s+import\s+)(.*)$/;

/** `import <items>` */
const PLAIN_IMPORT = /^(\s*)import\s+(.*)$/;

/** One `name` or `name as alias` item of an import list. */
const IMPORT_ITEM = /^([A-Za-z_][\w.]*)(?:\s+as\s+[A-Za-z_]\w*)?$/;

/**
 * Splits a trailing `#` comment off the statement body.
 */
function stripComment(text: string): string {
  const hash = text.indexOf('#');
  return hash === -1 ? text : text.slice(0, hash);
}

/**
 * Parses the comma-separated items of an import list. Returns the item
 * names, or undefined if any item is not a plain `name [as alias]`.
 */
function parseImportItems(list: string): string[] | undefined {
  const names: string[] = [];
  for (const raw of stripComment(list).split(',')) {
    const match = IMPORT_ITEM.exec(raw.trim());
    const name = match?.[1];
    if (name === undefined) {
      return undefined;
    }
    names.push(name);
  }
  return names;
}

/**
 * Rewrites `from <prefix> import a, b` where `<prefix>` is exactly a
 * rule's namespace.
 */
function transformNamespaceImport(
  head: string,
  mid: string,
  names: string,
  rule: RewriteRule,
  target: RewriteTarget
): LineTransform {
  const items = parseImportItems(names);
  if (items === undefined || items.some((item) => item.includes('.'))) {
    return {
      kind: 'mismatch',
      reason: `cannot parse the imported names '${names.trim()}' from '${rule.prefix}'`,
    };
  }

  const owned = items.filter((item) => ownsModule(rule, item));
  if (rule.modules !== undefined && owned.length === 0) {
    return UNCHANGED;
  }
  if (owned.length !== items.length) {
    const unowned = items.filter((item) => !ownsModule(rule, item));
    return {
      kind: 'mismatch',
      reason: `'${unowned.join(', ')}' imported from '${rule.prefix}' is not a generated module`,
    };
  }

  return { kind: 'rewritten', line: `${head}${qualifyModule(target)}${mid}${names}` };
}

/**
 * Whether a plain `import` of this path concerns the rewrite table. A bare
 * restricted namespace such as `google.protobuf` is the runtime package.
 */
function isClaimed(ownership: Ownership): boolean {
  if (ownership.kind === 'foreign') {
    return false;
  }
  return !(ownership.kind === 'namespace' && ownership.rule.modules !== undefined);
}

function transformFromImport(
  match: RegExpExecArray,
  rules: readonly RewriteRule[],
  target: RewriteTarget
): LineTransform {
  const [, head = '', modulePath = '', mid = '', names = ''] = match;
  const ownership = classifyModulePath(modulePath, rules);

  switch (ownership.kind) {
    case 'foreign':
      return UNCHANGED;
    case 'unexpected':
      return { kind: 'mismatch', reason: ownership.reason };
    case 'module':
      return {
        kind: 'rewritten',
        line: `${head}${qualifyModule(target, ownership.module)}${mid}${names}`,
      };
    case 'namespace':
      return transformNamespaceImport(head, mid, names, ownership.rule, target);
  }
}

function transformPlainImport(
  match: RegExpExecArray,
  rules: readonly RewriteRule[],
  target: RewriteTarget
): LineTransform {
  const [, indent = '', list = ''] = match;
  const rawItems = stripComment(list).split(',');

  const claims = rawItems
    .map((raw) => IMPORT_ITEM.exec(raw.trim())?.[1])
    .filter((name): name is string => name !== undefined)
    .map((name) => ({ name, ownership: classifyModulePath(name, rules) }))
    .filter((claim) => isClaimed(claim.ownership));

  const [claim] = claims;
  if (claim === undefined) {
    return UNCHANGED;
  }

  const { name, ownership } = claim;
  if (ownership.kind === 'unexpected') {
    return { kind: 'mismatch', reason: ownership.reason };
  }
  if (rawItems.length > 1) {
    return {
      kind: 'mismatch',
      reason: `'${name}' is imported together with other modules in one statement`,
    };
  }
  if (ownership.kind !== 'module') {
    return {
      kind: 'mismatch',
      reason: `'${name}' imports the namespace itself rather than a generated module`,
    };
  }

  // Without an alias the module would be referenced by its full dotted path.
  const afterName = list.slice(list.indexOf(name) + name.length);
  if (!/^\s+as\s/.test(afterName)) {
    return {
      kind: 'mismatch',
      reason: `'${name}' is imported without an alias`,
    };
  }

  return {
    kind: 'rewritten',
    line: `${indent}from ${qualifyModule(target)} import ${ownership.module}${afterName}`,
  };
}

/**
 * Transforms one line (without its line terminator).
 *
 * @param line - A source line.
 * @param rules - The rewrite table.
 * @param target - Where rewritten imports point.
 * @returns Whether the line was left alone, rewritten, or rejected.
 *
 * @example
 * ```typescript
 * transformLine(
 *   'import google.bigtable.v1.bigtable_data_pb2 as bigtable_data_pb2',
 *   [{ prefix: 'google.bigtable.v1' }],
 *   { style: 'relative' }
 * );
 * // { kind: 'rewritten', line: 'from . import bigtable_data_pb2 as bigtable_data_pb2' }
 * ```
 */
export function transformLine(
  line: string,
  rules: readonly RewriteRule[],
  target: RewriteTarget
): LineTransform {
  const fromMatch = FROM_IMPORT.exec(line);
  if (fromMatch !== null) {
    return transformFromImport(fromMatch, rules, target);
  }

  const plainMatch = PLAIN_IMPORT.exec(line);
  if (plainMatch !== null) {
    return transformPlainImport(plainMatch, rules, target);
  }

  return UNCHANGED;
}

/**
 * Transforms every line of a file. Line terminators (`\n` or `\r\n`) are
 * preserved. Stops at the first mismatch.
 *
 * @param content - File content.
 * @param rules - The rewrite table.
 * @param target - Where rewritten imports point.
 * @returns The new content, or the first offending line.
 */
export function transformSource(
  content: string,
  rules: readonly RewriteRule[],
  target: RewriteTarget
): SourceTransform {
  const lines = content.split('\n');
  let rewrittenLines = 0;

  for (let index = 0; index < lines.length; index++) {
    const original = lines[index] ?? '';
    const hasCarriageReturn = original.endsWith('\r');
    const body = hasCarriageReturn ? original.slice(0, -1) : original;

    const result = transformLine(body, rules, target);
    if (result.kind === 'mismatch') {
      return { success: false, line: index + 1, text: body, reason: result.reason };
    }
    if (result.kind === 'rewritten') {
      lines[index] = hasCarriageReturn ? `${result.line}\r` : result.line;
      rewrittenLines++;
    }
  }

  return { success: true, content: lines.join('\n'), rewrittenLines };
}
