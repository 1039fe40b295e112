/**
 * Default configuration values for protostub.toml.
 *
 * The defaults generate the Cloud Bigtable v1 client stubs into
 * `gcloud_bigtable/_generated`.
 *
 * @packageDocumentation
 */

import type {
  CompilerConfig,
  Config,
  GenerationUnit,
  LoggingConfig,
  PathConfig,
  RepositoryConfig,
  RewriteConfig,
  VerifyConfig,
} from './types.js';

/**
 * Default proto source repository.
 */
export const DEFAULT_REPOSITORY: RepositoryConfig = {
  url: 'https://github.com/GoogleCloudPlatform/cloud-bigtable-client',
  remote: 'origin',
  branch: 'master',
  checkout_dir: 'cloud-bigtable-client',
  proto_root: 'bigtable-protos/src/main/proto',
};

/**
 * Default output locations relative to the project root.
 */
export const DEFAULT_PATHS: PathConfig = {
  scratch_dir: 'generated_python',
  package_dir: 'gcloud_bigtable/_generated',
};

export const DEFAULT_COMPILER: CompilerConfig = {
  executable: 'protoc',
  extra_args: [],
};

export const DEFAULT_REWRITE: RewriteConfig = {
  style: 'relative',
};

export const DEFAULT_VERIFY: VerifyConfig = {
  interpreter: 'python3',
  modules: [],
};

/**
 * Default compiler invocations: the Bigtable service definitions, the
 * shared API annotations, and the well-known empty message. Only
 * `empty.proto` is taken from `google/protobuf`; the rest of that
 * namespace ships with the protobuf runtime.
 */
export const DEFAULT_UNITS: GenerationUnit[] = [
  { proto_dir: 'google/bigtable/v1' },
  { proto_dir: 'google/api' },
  { proto_dir: 'google/protobuf', files: ['empty.proto'] },
];

export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  repository: DEFAULT_REPOSITORY,
  paths: DEFAULT_PATHS,
  compiler: DEFAULT_COMPILER,
  rewrite: DEFAULT_REWRITE,
  verify: DEFAULT_VERIFY,
  units: DEFAULT_UNITS,
  logging: DEFAULT_LOGGING,
};
