/**
 * Project fixtures shared by pipeline and CLI tests.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { getDefaultConfig } from '../../src/config/parser.js';
import { resolveProject, type ProjectLayout } from '../../src/config/layout.js';
import type { Config } from '../../src/config/types.js';
import { Logger } from '../../src/utils/logger.js';

/** Proto root used by the default configuration, inside the checkout. */
export const PROTO_ROOT = 'bigtable-protos/src/main/proto';

/**
 * Source tree of the fake proto repository, keyed by path relative to the
 * checkout. Each `.proto` holds the Python the fake compiler emits for it.
 */
export const PROTO_REPOSITORY: Record<string, string> = {
  'README.md': 'Protocol definitions.\n',
  [`${PROTO_ROOT}/google/bigtable/v1/bigtable_data.proto`]: [
    '# Generated by the protocol buffer compiler.  DO NOT EDIT!',
    'from google.protobuf import descriptor as _descriptor',
    'from google.api import annotations_pb2 as google_dot_api_dot_annotations__pb2',
    '',
  ].join('\n'),
  [`${PROTO_ROOT}/google/bigtable/v1/bigtable_service.proto`]: [
    '# Generated by the protocol buffer compiler.  DO NOT EDIT!',
    'from google.protobuf import descriptor as _descriptor',
    'import google.bigtable.v1.bigtable_data_pb2 as bigtable_data_pb2',
    'from google.protobuf import empty_pb2 as google_dot_protobuf_dot_empty__pb2',
    '',
  ].join('\n'),
  [`${PROTO_ROOT}/google/api/annotations.proto`]: [
    'from google.protobuf import descriptor as _descriptor',
    'from google.api import http_pb2 as google_dot_api_dot_http__pb2',
    'from google.protobuf import descriptor_pb2 as google_dot_protobuf_dot_descriptor__pb2',
    '',
  ].join('\n'),
  [`${PROTO_ROOT}/google/api/http.proto`]: [
    'from google.protobuf import descriptor as _descriptor',
    '',
  ].join('\n'),
  [`${PROTO_ROOT}/google/protobuf/empty.proto`]: [
    'from google.protobuf import descriptor as _descriptor',
    '',
  ].join('\n'),
  [`${PROTO_ROOT}/google/protobuf/any.proto`]: [
    'from google.protobuf import descriptor as _descriptor',
    '',
  ].join('\n'),
};

/** Generated modules the default units produce from {@link PROTO_REPOSITORY}. */
export const GENERATED_MODULES = [
  'annotations_pb2',
  'bigtable_data_pb2',
  'bigtable_service_pb2',
  'empty_pb2',
  'http_pb2',
];

export interface TestProject {
  readonly root: string;
  readonly config: Config;
  readonly layout: ProjectLayout;
  readonly logger: Logger;
  readonly logLines: string[];
  cleanup(): Promise<void>;
}

/**
 * Creates an empty project root in a temporary directory with the default
 * configuration and a logger that captures its output.
 */
export async function createTestProject(config: Config = getDefaultConfig()): Promise<TestProject> {
  const root = await mkdtemp(path.join(os.tmpdir(), 'protostub-project-'));
  const logLines: string[] = [];
  return {
    root,
    config,
    layout: resolveProject(config, root),
    logger: new Logger({ component: 'test', debugMode: true, sink: (line) => logLines.push(line) }),
    logLines,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}
