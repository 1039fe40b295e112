import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { DEFAULT_UNITS } from '../config/defaults.js';
import { matchesPrefix, rulesForUnits, type RewriteTarget } from './rules.js';
import { transformLine, transformSource } from './transform.js';

const RULES = rulesForUnits(DEFAULT_UNITS);
const RELATIVE: RewriteTarget = { style: 'relative' };
const ABSOLUTE: RewriteTarget = { style: 'absolute', packageName: 'gcloud_bigtable._generated' };

function rewritten(line: string, target: RewriteTarget = RELATIVE): string {
  const result = transformLine(line, RULES, target);
  if (result.kind !== 'rewritten') {
    throw new Error(`Expected '${line}' to be rewritten, got ${result.kind}`);
  }
  return result.line;
}

function mismatchReason(line: string): string {
  const result = transformLine(line, RULES, RELATIVE);
  if (result.kind !== 'mismatch') {
    throw new Error(`Expected '${line}' to be rejected, got ${result.kind}`);
  }
  return result.reason;
}

describe('transformLine', () => {
  describe('rewriting owned imports', () => {
    it('should turn a dotted import with alias into a sibling import', () => {
      expect(rewritten('import google.bigtable.v1.bigtable_data_pb2 as bigtable_data_pb2')).toBe(
        'from . import bigtable_data_pb2 as bigtable_data_pb2'
      );
    });

    it('should rewrite from-imports of a namespace', () => {
      expect(
        rewritten('from google.api import annotations_pb2 as google_dot_api_dot_annotations__pb2')
      ).toBe('from . import annotations_pb2 as google_dot_api_dot_annotations__pb2');
    });

    it('should rewrite several generated modules in one from-import', () => {
      expect(
        rewritten('from google.bigtable.v1 import bigtable_data_pb2, bigtable_service_messages_pb2')
      ).toBe('from . import bigtable_data_pb2, bigtable_service_messages_pb2');
    });

    it('should rewrite the locally generated empty message', () => {
      expect(
        rewritten('from google.protobuf import empty_pb2 as google_dot_protobuf_dot_empty__pb2')
      ).toBe('from . import empty_pb2 as google_dot_protobuf_dot_empty__pb2');
    });

    it('should rewrite imports from inside a generated module', () => {
      expect(rewritten('from google.bigtable.v1.bigtable_data_pb2 import Cell')).toBe(
        'from .bigtable_data_pb2 import Cell'
      );
    });

    it('should keep indentation, spacing and trailing comments', () => {
      expect(rewritten('    from google.api  import  http_pb2  # http rules')).toBe(
        '    from .  import  http_pb2  # http rules'
      );
    });

    it('should name the package for absolute targets', () => {
      expect(rewritten('from google.api import http_pb2', ABSOLUTE)).toBe(
        'from gcloud_bigtable._generated import http_pb2'
      );
      expect(rewritten('import google.api.http_pb2 as http_pb2', ABSOLUTE)).toBe(
        'from gcloud_bigtable._generated import http_pb2 as http_pb2'
      );
      expect(rewritten('from google.api.http_pb2 import HttpRule', ABSOLUTE)).toBe(
        'from gcloud_bigtable._generated.http_pb2 import HttpRule'
      );
    });
  });

  describe('leaving other lines alone', () => {
    it.each([
      'import google.protobuf.descriptor_pb2 as descriptor_pb2',
      'from google.protobuf import descriptor as _descriptor',
      'from google.protobuf.internal import builder as _builder',
      'import google.protobuf',
      'from google.apis import thing',
      'import google.api_core as core',
      'import sys',
      'from . import bigtable_data_pb2 as bigtable_data_pb2',
      'from .bigtable_data_pb2 import Cell',
      "DESCRIPTOR = _descriptor.FileDescriptor(name='google/api/http.proto')",
      '',
      '# import google.api.http_pb2',
    ])('should not change %j', (line) => {
      expect(transformLine(line, RULES, RELATIVE)).toEqual({ kind: 'unchanged' });
    });
  });

  describe('rejecting unexpected shapes', () => {
    it('should reject modules nested more than one level deep', () => {
      expect(mismatchReason('from google.bigtable.v1.admin.table_pb2 import Table')).toBe(
        "'google.bigtable.v1.admin.table_pb2' is nested more than one level below 'google.bigtable.v1'"
      );
      expect(mismatchReason('import google.api.sub.http_pb2 as h')).toBe(
        "'google.api.sub.http_pb2' is nested more than one level below 'google.api'"
      );
    });

    it('should reject a dotted import without alias', () => {
      expect(mismatchReason('import google.api.http_pb2')).toBe(
        "'google.api.http_pb2' is imported without an alias"
      );
    });

    it('should reject importing an owned namespace itself', () => {
      expect(mismatchReason('import google.bigtable.v1')).toBe(
        "'google.bigtable.v1' imports the namespace itself rather than a generated module"
      );
    });

    it('should reject star imports', () => {
      expect(mismatchReason('from google.api import *')).toBe(
        "cannot parse the imported names '*' from 'google.api'"
      );
    });

    it('should reject parenthesised continuations', () => {
      expect(mismatchReason('from google.api import (http_pb2,')).toBe(
        "cannot parse the imported names '(http_pb2,' from 'google.api'"
      );
    });

    it('should reject mixing owned and runtime names of a restricted namespace', () => {
      expect(mismatchReason('from google.protobuf import empty_pb2, descriptor')).toBe(
        "'descriptor' imported from 'google.protobuf' is not a generated module"
      );
    });

    it('should reject non-generated names from an unrestricted namespace', () => {
      expect(mismatchReason('from google.api import annotations')).toBe(
        "'annotations' imported from 'google.api' is not a generated module"
      );
    });

    it('should reject an owned module imported alongside others', () => {
      expect(mismatchReason('import os, google.api.http_pb2 as h')).toBe(
        "'google.api.http_pb2' is imported together with other modules in one statement"
      );
    });
  });
});

describe('transformSource', () => {
  it('should rewrite every owned import and count the lines', () => {
    const source = [
      '# Generated by the protocol buffer compiler.  DO NOT EDIT!',
      'from google.protobuf import descriptor as _descriptor',
      'from google.api import annotations_pb2 as google_dot_api_dot_annotations__pb2',
      'from google.protobuf import empty_pb2 as google_dot_protobuf_dot_empty__pb2',
      '',
      "DESCRIPTOR = _descriptor.FileDescriptor(name='x.proto')",
      '',
    ].join('\n');

    const result = transformSource(source, RULES, RELATIVE);

    expect(result).toEqual({
      success: true,
      content: [
        '# Generated by the protocol buffer compiler.  DO NOT EDIT!',
        'from google.protobuf import descriptor as _descriptor',
        'from . import annotations_pb2 as google_dot_api_dot_annotations__pb2',
        'from . import empty_pb2 as google_dot_protobuf_dot_empty__pb2',
        '',
        "DESCRIPTOR = _descriptor.FileDescriptor(name='x.proto')",
        '',
      ].join('\n'),
      rewrittenLines: 2,
    });
  });

  it('should preserve CRLF line endings', () => {
    const result = transformSource('import google.api.http_pb2 as h\r\nx = 1\r\n', RULES, RELATIVE);

    expect(result).toEqual({
      success: true,
      content: 'from . import http_pb2 as h\r\nx = 1\r\n',
      rewrittenLines: 1,
    });
  });

  it('should report the first offending line', () => {
    const result = transformSource('import sys\nx = 1\nfrom google.api import *\n', RULES, RELATIVE);

    expect(result).toEqual({
      success: false,
      line: 3,
      text: 'from google.api import *',
      reason: "cannot parse the imported names '*' from 'google.api'",
    });
  });

  describe('properties', () => {
    const ownedLines = [
      'import google.bigtable.v1.bigtable_data_pb2 as bigtable_data_pb2',
      'from google.api import http_pb2 as google_dot_api_dot_http__pb2',
      'from google.protobuf import empty_pb2 as google_dot_protobuf_dot_empty__pb2',
      'from google.bigtable.v1.bigtable_data_pb2 import Cell',
    ];
    const runtimeLines = [
      'from google.protobuf import descriptor as _descriptor',
      'import google.protobuf.descriptor_pb2 as descriptor_pb2',
      'from google.protobuf.internal import builder as _builder',
    ];
    const plainText = fc.string().filter((s) => !s.includes('import'));
    const sourceLine = fc.oneof(
      fc.constantFrom(...ownedLines),
      fc.constantFrom(...runtimeLines),
      plainText
    );
    const target = fc.constantFrom<RewriteTarget>(RELATIVE, ABSOLUTE);

    it('rewriting twice gives the same content as rewriting once', () => {
      fc.assert(
        fc.property(fc.array(sourceLine), target, (lines, rewriteTarget) => {
          const once = transformSource(lines.join('\n'), RULES, rewriteTarget);
          if (!once.success) {
            throw new Error(`unexpected mismatch: ${once.reason}`);
          }
          const twice = transformSource(once.content, RULES, rewriteTarget);
          expect(twice).toEqual({ success: true, content: once.content, rewrittenLines: 0 });
        })
      );
    });

    const identifier = fc
      .stringMatching(/^[a-z][a-z0-9]{0,6}$/)
      .filter((s) => !['as', 'from', 'import'].includes(s));

    it('strips the prefix and keeps the module name and alias', () => {
      fc.assert(
        fc.property(
          fc.constantFrom('google.bigtable.v1', 'google.api'),
          identifier,
          identifier,
          (prefix, stem, alias) => {
            const module = `${stem}_pb2`;
            expect(rewritten(`import ${prefix}.${module} as ${alias}`)).toBe(
              `from . import ${module} as ${alias}`
            );
            expect(rewritten(`from ${prefix} import ${module} as ${alias}`)).toBe(
              `from . import ${module} as ${alias}`
            );
          }
        )
      );
    });

    it('leaves imports outside every prefix byte-for-byte unchanged', () => {
      const modulePath = fc
        .array(identifier, { minLength: 1, maxLength: 4 })
        .map((segments) => segments.join('.'))
        .filter((path) => !RULES.some((rule) => matchesPrefix(path, rule.prefix)));

      fc.assert(
        fc.property(modulePath, identifier, (path, name) => {
          for (const line of [`import ${path} as ${name}`, `from ${path} import ${name}`]) {
            expect(transformLine(line, RULES, RELATIVE)).toEqual({ kind: 'unchanged' });
          }
        })
      );
    });
  });
});
