/**
 * Import rewriting for relocated generated modules.
 *
 * @packageDocumentation
 */

export {
  GENERATED_FILE_SUFFIX,
  GENERATED_MODULE_SUFFIX,
  classifyModulePath,
  generatedModuleName,
  matchesPrefix,
  ownsModule,
  prefixForProtoDir,
  qualifyModule,
  rulesForUnits,
} from './rules.js';
export type { Ownership, RewriteRule, RewriteTarget } from './rules.js';
export { transformLine, transformSource } from './transform.js';
export type { LineTransform, SourceTransform } from './transform.js';
export { rewritePackage } from './rewriter.js';
export type { RewritePackageOptions, RewriteSummary } from './rewriter.js';
