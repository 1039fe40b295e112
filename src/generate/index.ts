/**
 * Fetch, compile and relocate steps and the generate pipeline.
 *
 * @packageDocumentation
 */

export { GIT_EXECUTABLE, fetchProtos } from './fetch.js';
export type { FetchOptions, FetchSummary } from './fetch.js';
export { compileUnit, selectProtoFiles, unitDirectory } from './compile.js';
export type { CompileOptions, CompileSummary } from './compile.js';
export { PACKAGE_INIT_FILE, ensurePackageInit, relocateUnit } from './relocate.js';
export type { RelocateOptions, RelocateSummary } from './relocate.js';
export { rewriteProject, runGenerate } from './pipeline.js';
export type {
  GenerateOptions,
  GenerateSummary,
  RewriteProjectOptions,
  UnitSummary,
} from './pipeline.js';
