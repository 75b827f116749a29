/**
 * Error types for idxmeta operations
 *
 * Invariants:
 * - File errors include the absolute target path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 *
 * The IndexDescription value type itself never throws; these cover the codec
 * and file layers around it.
 */

/**
 * Base class for all idxmeta errors
 */
export abstract class IdxmetaError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A single problem found while decoding a wire record
 */
export interface DecodeIssue {
  /** Path to the offending value, e.g. "num_indexed_rows" or "[2].index_type" */
  path: string;
  message: string;
}

/**
 * Thrown when input cannot be decoded into an IndexDescription
 */
export class IndexDescriptionDecodeError extends IdxmetaError {
  readonly code = "E_DECODE";

  constructor(
    public readonly issues: DecodeIssue[],
    source = "input",
    options?: ErrorOptions
  ) {
    super(
      `Invalid index description in ${source}: ` +
        issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; "),
      options
    );
  }
}

/**
 * Thrown when a description file does not exist
 */
export class DescriptionFileNotFoundError extends IdxmetaError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Description file not found: ${filePath}`, options);
  }
}

/**
 * Thrown when a description file cannot be read
 */
export class DescriptionFileReadError extends IdxmetaError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read description file: ${filePath}`, options);
  }
}

/**
 * Thrown when a description file cannot be written
 */
export class DescriptionFileWriteError extends IdxmetaError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write description file: ${filePath}`, options);
  }
}
