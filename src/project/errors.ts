/**
 * Error type for project file read and write operations.
 *
 * @packageDocumentation
 */

/**
 * Kind of failure reported by a project file operation.
 *
 * - `open_error`: the source document could not be opened or read
 * - `parse_error`: the document is not well-formed XML
 * - `schema_error`: the root element is missing or is not `project`
 * - `write_error`: the destination could not be created or written
 */
export type ProjectFileErrorType = 'open_error' | 'parse_error' | 'schema_error' | 'write_error';

/**
 * Error raised when a project file cannot be read or written.
 */
export class ProjectFileError extends Error {
  /** The kind of failure. */
  public readonly errorType: ProjectFileErrorType;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ProjectFileError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The kind of failure.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    errorType: ProjectFileErrorType,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'ProjectFileError';
    this.errorType = errorType;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/**
 * Converts an unknown thrown value into an Error.
 *
 * @param error - The caught value.
 * @returns The value itself when it is an Error, otherwise a wrapping Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
