/**
 * File system helpers with path validation.
 *
 * Every path is checked and resolved to an absolute path before the
 * operation runs, so an empty or NUL-containing path never reaches `node:fs`.
 *
 * @packageDocumentation
 */

import * as fsSync from 'node:fs';
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
 * @throws {PathValidationError} If the path is empty, contains null bytes, or
 *   does not resolve to an absolute path.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

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
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadTextFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, 'utf-8');
}

/**
 * Synchronously writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be written (e.g., permission denied, directory does not exist).
 */
export function safeWriteTextFileSync(filePath: string, data: string): void {
  const validatedPath = validatePath(filePath);
  fsSync.writeFileSync(validatedPath, data, 'utf-8');
}

