import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  ConfigValidationError,
  assertConfigValid,
  isIdentifier,
  validateConfig,
} from './validator.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

function fieldsOf(toml: string): string[] {
  return validateConfig(parseConfig(toml)).errors.map((e) => e.field);
}

describe('Config Validator', () => {
  describe('validateConfig', () => {
    it('should accept the default configuration', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    describe('paths', () => {
      it('should reject absolute paths', () => {
        const result = validateConfig(parseConfig('[paths]\nscratch_dir = "/tmp/out"'));
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([
          {
            field: 'paths.scratch_dir',
            value: '/tmp/out',
            message: "'paths.scratch_dir' must be a relative path, got '/tmp/out'",
          },
        ]);
      });

      it('should reject parent segments', () => {
        expect(fieldsOf('[repository]\ncheckout_dir = "../protos"')).toEqual([
          'repository.checkout_dir',
        ]);
        expect(fieldsOf('[repository]\nproto_root = "src/../../x"')).toEqual([
          'repository.proto_root',
        ]);
      });

      it('should reject empty paths', () => {
        expect(fieldsOf('[paths]\npackage_dir = ""')).toContain('paths.package_dir');
      });

      it('should reject a scratch directory inside the package directory', () => {
        const result = validateConfig(
          parseConfig('[paths]\nscratch_dir = "gcloud_bigtable/_generated/tmp"')
        );
        expect(result.errors).toEqual([
          {
            field: 'paths.package_dir',
            value: 'gcloud_bigtable/_generated',
            message:
              "'paths.package_dir' overlaps 'paths.scratch_dir' ('gcloud_bigtable/_generated' and 'gcloud_bigtable/_generated/tmp')",
          },
        ]);
      });

      it('should reject identical directories after normalisation', () => {
        const toml = `
[repository]
checkout_dir = "work/"

[paths]
scratch_dir = "./work"
`;
        expect(fieldsOf(toml)).toEqual(['paths.scratch_dir']);
      });

      it('should treat the project root itself as overlapping everything', () => {
        expect(fieldsOf('[paths]\nscratch_dir = "."')).toEqual([
          'paths.scratch_dir',
          'paths.package_dir',
        ]);
      });

      it('should allow sibling directories sharing a name prefix', () => {
        const toml = `
[repository]
checkout_dir = "gen"

[paths]
scratch_dir = "generated"
package_dir = "gen_pkg/_generated"
`;
        expect(fieldsOf(toml)).toEqual([]);
      });
    });

    describe('units', () => {
      it('should require at least one unit', () => {
        const config = { ...DEFAULT_CONFIG, units: [] };
        expect(validateConfig(config).errors).toEqual([
          { field: 'units', value: [], message: 'At least one unit is required' },
        ]);
      });

      it('should reject duplicate proto directories', () => {
        const toml = `
[[units]]
proto_dir = "acme/api"

[[units]]
proto_dir = "acme/api/"
`;
        expect(validateConfig(parseConfig(toml)).errors).toEqual([
          {
            field: 'units[1].proto_dir',
            value: 'acme/api/',
            message: "Duplicate proto_dir 'acme/api/'",
          },
        ]);
      });

      it('should require .proto file names', () => {
        const toml = `
[[units]]
proto_dir = "acme/api"
files = ["service.proto", "types.txt", "nested/x.proto"]
`;
        expect(fieldsOf(toml)).toEqual(['units[0].files[1]', 'units[0].files[2]']);
      });

      it('should reject an empty file list', () => {
        expect(fieldsOf('[[units]]\nproto_dir = "acme/api"\nfiles = []')).toEqual([
          'units[0].files',
        ]);
      });

      it('should reject absolute proto directories', () => {
        expect(fieldsOf('[[units]]\nproto_dir = "/acme/api"')).toEqual(['units[0].proto_dir']);
      });
    });

    describe('package name', () => {
      it('should reject a package directory that is not a dotted identifier', () => {
        const result = validateConfig(parseConfig('[paths]\npackage_dir = "my-client/_generated"'));
        expect(result.errors).toEqual([
          {
            field: 'paths.package_dir',
            value: 'my-client._generated',
            message: "Package name 'my-client._generated' must be a dotted sequence of identifiers",
          },
        ]);
      });

      it('should accept an explicit package name for an unusual directory', () => {
        const toml = `
[paths]
package_dir = "my-client/_generated"

[rewrite]
package = "my_client._generated"
`;
        expect(fieldsOf(toml)).toEqual([]);
      });

      it('should reject a package name under a rewritten namespace', () => {
        const result = validateConfig(parseConfig('[paths]\npackage_dir = "google/api/flat"'));
        expect(result.errors).toEqual([
          {
            field: 'paths.package_dir',
            value: 'google.api.flat',
            message: "Package name 'google.api.flat' lies under the rewritten namespace 'google.api'",
          },
        ]);
      });

      it('should attribute the error to rewrite.package when it is set', () => {
        expect(fieldsOf('[rewrite]\npackage = "google.bigtable.v1"')).toEqual(['rewrite.package']);
      });
    });

    describe('verify and scalars', () => {
      it('should require module identifiers', () => {
        expect(fieldsOf('[verify]\nmodules = ["data_pb2", "data_pb2.py"]')).toEqual([
          'verify.modules[1]',
        ]);
      });

      it('should reject empty scalar settings', () => {
        const toml = `
[repository]
url = ""
branch = " "

[compiler]
executable = ""

[verify]
interpreter = ""
`;
        expect(fieldsOf(toml)).toEqual([
          'repository.url',
          'repository.branch',
          'compiler.executable',
          'verify.interpreter',
        ]);
      });
    });
  });

  describe('assertConfigValid', () => {
    it('should not throw for a valid configuration', () => {
      expect(() => {
        assertConfigValid(DEFAULT_CONFIG);
      }).not.toThrow();
    });

    it('should list every error in the message', () => {
      const config = parseConfig(`
[paths]
scratch_dir = "/abs"

[verify]
modules = ["bad-name"]
`);
      try {
        assertConfigValid(config);
        expect.unreachable('assertConfigValid should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.errors).toHaveLength(2);
          expect(error.message).toBe(
            [
              'Configuration validation failed with 2 error(s):',
              "  - paths.scratch_dir: 'paths.scratch_dir' must be a relative path, got '/abs'",
              "  - verify.modules[0]: 'verify.modules[0]' must be a module identifier, got 'bad-name'",
            ].join('\n')
          );
        }
      }
    });
  });

  describe('isIdentifier', () => {
    it('should accept identifiers', () => {
      fc.assert(
        fc.property(fc.stringMatching(/^[A-Za-z_][A-Za-z0-9_]{0,15}$/), (name) => {
          expect(isIdentifier(name)).toBe(true);
        })
      );
    });

    it.each(['', '1abc', 'a-b', 'a.b', 'a b'])('should reject %j', (name) => {
      expect(isIdentifier(name)).toBe(false);
    });
  });
});
