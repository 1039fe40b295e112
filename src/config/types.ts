/**
 * Configuration types for protostub.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * The remote repository holding the `.proto` sources.
 */
export interface RepositoryConfig {
  /** Clone URL. */
  url: string;
  /** Remote name used for pulls. */
  remote: string;
  /** Branch pulled on every run. */
  branch: string;
  /** Checkout directory, relative to the project root. */
  checkout_dir: string;
  /** Directory inside the checkout that `.proto` import paths are relative to. */
  proto_root: string;
}

/**
 * Output locations, relative to the project root.
 */
export interface PathConfig {
  /** Scratch directory the compiler writes into. */
  scratch_dir: string;
  /** Flat package directory that receives the generated modules. */
  package_dir: string;
}

/**
 * Protocol compiler invocation.
 */
export interface CompilerConfig {
  /** Compiler executable. */
  executable: string;
  /** Extra arguments appended to every invocation. */
  extra_args: string[];
}

/**
 * How rewritten imports name the package.
 *
 * - `relative`: `from . import foo_pb2`
 * - `absolute`: `from my_pkg._generated import foo_pb2`
 */
export type RewriteStyle = 'relative' | 'absolute';

/**
 * Import rewrite settings.
 */
export interface RewriteConfig {
  /** Form of the rewritten imports. */
  style: RewriteStyle;
  /**
   * Dotted package name. When unset, derived from `paths.package_dir`.
   */
  package?: string;
}

/**
 * Load verification settings.
 */
export interface VerifyConfig {
  /** Interpreter used for the probes. */
  interpreter: string;
  /** Modules to probe. When empty, every generated module found is probed. */
  modules: string[];
}

/**
 * One compiler invocation.
 */
export interface GenerationUnit {
  /** Namespace directory under the proto root, e.g. `google/bigtable/v1`. */
  proto_dir: string;
  /**
   * `.proto` file names inside `proto_dir` to compile. When unset, every
   * `.proto` directly inside it is compiled.
   */
  files?: string[];
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Whether debug entries are emitted. */
  debug: boolean;
}

/**
 * Complete configuration object parsed from protostub.toml.
 */
export interface Config {
  repository: RepositoryConfig;
  paths: PathConfig;
  compiler: CompilerConfig;
  rewrite: RewriteConfig;
  verify: VerifyConfig;
  /** Compiler invocations, in order. */
  units: GenerationUnit[];
  logging: LoggingConfig;
}

/**
 * Partial configuration for merging overrides.
 */
export interface PartialConfig {
  repository?: Partial<RepositoryConfig>;
  paths?: Partial<PathConfig>;
  compiler?: Partial<CompilerConfig>;
  rewrite?: Partial<RewriteConfig>;
  verify?: Partial<VerifyConfig>;
  logging?: Partial<LoggingConfig>;
}
