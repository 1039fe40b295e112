/**
 * Semantic validation for configuration values.
 *
 * Validates what type checking in the parser cannot:
 * - Paths are relative, stay inside the project, and do not overlap
 * - Generation units are well-formed and distinct
 * - The package name is a dotted identifier outside every rewrite prefix
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { matchesPrefix, rulesForUnits } from '../rewrite/rules.js';
import { effectivePackageName } from './layout.js';
import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Whether a name is a valid Python identifier (ASCII subset).
 */
export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

function normalizeRelative(value: string): string {
  return path.posix.normalize(value.replace(/\\/g, '/')).replace(/\/+$/, '');
}

/**
 * Validates that a string is non-empty.
 */
function validateNonEmpty(value: string, fieldPath: string, errors: ValidationError[]): void {
  if (value.trim().length === 0) {
    errors.push({ field: fieldPath, value, message: `'${fieldPath}' must not be empty` });
  }
}

/**
 * Validates that a path is non-empty, relative, and has no `..` segment.
 * Returns whether the path passed.
 */
function validateRelativePath(value: string, fieldPath: string, errors: ValidationError[]): boolean {
  if (value.trim().length === 0) {
    errors.push({ field: fieldPath, value, message: `'${fieldPath}' must not be empty` });
    return false;
  }
  if (path.isAbsolute(value) || path.posix.isAbsolute(value.replace(/\\/g, '/'))) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must be a relative path, got '${value}'`,
    });
    return false;
  }
  if (value.split(/[\\/]/).includes('..')) {
    errors.push({
      field: fieldPath,
      value,
      message: `'${fieldPath}' must not contain '..' segments, got '${value}'`,
    });
    return false;
  }
  return true;
}

/**
 * Whether one relative directory equals or contains the other.
 */
function overlaps(a: string, b: string): boolean {
  const left = normalizeRelative(a);
  const right = normalizeRelative(b);
  if (left === '.' || right === '.') {
    return true;
  }
  return left === right || left.startsWith(`${right}/`) || right.startsWith(`${left}/`);
}

function validatePaths(config: Config, errors: ValidationError[]): void {
  const directories: { field: string; value: string }[] = [
    { field: 'repository.checkout_dir', value: config.repository.checkout_dir },
    { field: 'paths.scratch_dir', value: config.paths.scratch_dir },
    { field: 'paths.package_dir', value: config.paths.package_dir },
  ];

  const valid = directories.filter((dir) => validateRelativePath(dir.value, dir.field, errors));
  validateRelativePath(config.repository.proto_root, 'repository.proto_root', errors);

  for (let i = 0; i < valid.length; i++) {
    for (let j = i + 1; j < valid.length; j++) {
      const first = valid[i];
      const second = valid[j];
      if (first !== undefined && second !== undefined && overlaps(first.value, second.value)) {
        errors.push({
          field: second.field,
          value: second.value,
          message: `'${second.field}' overlaps '${first.field}' ('${second.value}' and '${first.value}')`,
        });
      }
    }
  }
}

function validateUnits(config: Config, errors: ValidationError[]): void {
  if (config.units.length === 0) {
    errors.push({ field: 'units', value: config.units, message: 'At least one unit is required' });
    return;
  }

  const seen = new Set<string>();
  config.units.forEach((unit, index) => {
    const fieldPath = `units[${String(index)}]`;
    if (!validateRelativePath(unit.proto_dir, `${fieldPath}.proto_dir`, errors)) {
      return;
    }

    const normalized = normalizeRelative(unit.proto_dir);
    if (seen.has(normalized)) {
      errors.push({
        field: `${fieldPath}.proto_dir`,
        value: unit.proto_dir,
        message: `Duplicate proto_dir '${unit.proto_dir}'`,
      });
    }
    seen.add(normalized);

    if (unit.files === undefined) {
      return;
    }
    if (unit.files.length === 0) {
      errors.push({
        field: `${fieldPath}.files`,
        value: unit.files,
        message: `'${fieldPath}.files' must list at least one file when present`,
      });
    }
    unit.files.forEach((file, fileIndex) => {
      const filePath = `${fieldPath}.files[${String(fileIndex)}]`;
      if (!file.endsWith('.proto') || /[\\/]/.test(file)) {
        errors.push({
          field: filePath,
          value: file,
          message: `'${filePath}' must be a .proto file name inside the unit directory, got '${file}'`,
        });
      }
    });
  });
}

function validatePackageName(config: Config, errors: ValidationError[]): void {
  const packageName = effectivePackageName(config);
  const field = config.rewrite.package === undefined ? 'paths.package_dir' : 'rewrite.package';

  const segments = packageName.split('.');
  if (packageName.length === 0 || !segments.every(isIdentifier)) {
    errors.push({
      field,
      value: packageName,
      message: `Package name '${packageName}' must be a dotted sequence of identifiers`,
    });
    return;
  }

  for (const rule of rulesForUnits(config.units)) {
    if (rule.prefix.length > 0 && matchesPrefix(packageName, rule.prefix)) {
      errors.push({
        field,
        value: packageName,
        message: `Package name '${packageName}' lies under the rewritten namespace '${rule.prefix}'`,
      });
    }
  }
}

function validateVerify(config: Config, errors: ValidationError[]): void {
  validateNonEmpty(config.verify.interpreter, 'verify.interpreter', errors);
  config.verify.modules.forEach((module, index) => {
    if (!isIdentifier(module)) {
      const fieldPath = `verify.modules[${String(index)}]`;
      errors.push({
        field: fieldPath,
        value: module,
        message: `'${fieldPath}' must be a module identifier, got '${module}'`,
      });
    }
  });
}

/**
 * Validates configuration semantically, collecting every error.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  validateNonEmpty(config.repository.url, 'repository.url', errors);
  validateNonEmpty(config.repository.remote, 'repository.remote', errors);
  validateNonEmpty(config.repository.branch, 'repository.branch', errors);
  validateNonEmpty(config.compiler.executable, 'compiler.executable', errors);
  validatePaths(config, errors);
  validateUnits(config, errors);
  validatePackageName(config, errors);
  validateVerify(config, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
