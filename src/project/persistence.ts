/**
 * Reading and writing project documents on disk.
 *
 * @packageDocumentation
 */

import { safeReadTextFileSync, safeWriteTextFileSync } from '../utils/safe-fs.js';
import { ProjectFileError, toError } from './errors.js';
import { parseProjectDocument } from './reader.js';
import type { ReadOptions } from './reader.js';
import type { ProjectConfigData } from './types.js';
import { serializeProjectDocument } from './writer.js';
import type { WriteOptions } from './writer.js';

/**
 * Reads the text of a project document.
 *
 * @param filename - Path of the document.
 * @returns The document text.
 * @throws ProjectFileError with `open_error` when the file cannot be read.
 */
export function readProjectDocument(filename: string): string {
  try {
    return safeReadTextFileSync(filename);
  } catch (error) {
    const cause = toError(error);
    throw new ProjectFileError(`Cannot open project file '${filename}'`, 'open_error', {
      details: cause.message,
      cause,
    });
  }
}

/**
 * Writes the text of a project document.
 *
 * @param filename - Path of the document.
 * @param xml - The document text.
 * @throws ProjectFileError with `write_error` when the file cannot be written.
 */
export function writeProjectDocument(filename: string, xml: string): void {
  try {
    safeWriteTextFileSync(filename, xml);
  } catch (error) {
    const cause = toError(error);
    throw new ProjectFileError(`Cannot write project file '${filename}'`, 'write_error', {
      details: cause.message,
      cause,
    });
  }
}

/**
 * Loads a project model from disk.
 *
 * @param filename - Path of the document.
 * @param options - Read options.
 * @returns The project model.
 * @throws ProjectFileError with `open_error`, `parse_error` or `schema_error`.
 *
 * @example
 * ```typescript
 * const config = loadProjectFile('app.cppcheck');
 * console.log(config.includeDirs);
 * ```
 */
export function loadProjectFile(filename: string, options?: ReadOptions): ProjectConfigData {
  return parseProjectDocument(readProjectDocument(filename), options);
}

/**
 * Saves a project model to disk in canonical form.
 *
 * @param filename - Path of the document.
 * @param data - The project model.
 * @param options - Formatting options.
 * @throws ProjectFileError with `write_error`.
 */
export function saveProjectFile(
  filename: string,
  data: ProjectConfigData,
  options?: WriteOptions
): void {
  let xml: string;
  try {
    xml = serializeProjectDocument(data, options);
  } catch (error) {
    const cause = toError(error);
    throw new ProjectFileError(`Cannot serialize project file '${filename}'`, 'write_error', {
      details: cause.message,
      cause,
    });
  }
  writeProjectDocument(filename, xml);
}
