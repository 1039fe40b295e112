/**
 * File system helpers with path validation.
 *
 * Every helper resolves its path to an absolute one and rejects empty
 * paths or paths containing null bytes before touching the disk. The
 * generate, rewrite and clean steps do all of their file work through
 * this module.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file, replacing any existing content.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 */
export async function safeWriteTextFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Checks if a file or directory exists.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory and any missing parents.
 *
 * @param dirPath - The directory to create.
 */
export async function safeMkdirp(dirPath: string): Promise<void> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Lists the names of the regular files directly inside a directory,
 * sorted by name.
 *
 * @param dirPath - The directory to list.
 * @returns File names (not paths).
 * @throws {Error} If the directory cannot be read.
 */
export async function safeListFiles(dirPath: string): Promise<string[]> {
  const validatedPath = validatePath(dirPath);
  const entries = await fs.readdir(validatedPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * Moves a file, overwriting the destination. Falls back to copy and
 * delete when the rename crosses devices.
 *
 * @param fromPath - The current path of the file.
 * @param toPath - The destination path.
 */
export async function safeMoveFile(fromPath: string, toPath: string): Promise<void> {
  const validatedFrom = validatePath(fromPath);
  const validatedTo = validatePath(toPath);
  try {
    await fs.rename(validatedFrom, validatedTo);
  } catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }
    await fs.copyFile(validatedFrom, validatedTo);
    await fs.unlink(validatedFrom);
  }
}

/**
 * Recursively removes a file or directory. Absent paths are ignored.
 *
 * @param targetPath - The path to remove.
 */
export async function safeRemoveTree(targetPath: string): Promise<void> {
  const validatedPath = validatePath(targetPath);
  await fs.rm(validatedPath, { recursive: true, force: true });
}
