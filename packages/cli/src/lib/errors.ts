/**
 * CLI error handling and exit code mapping
 */

/**
 * Exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: description file not found
 * - 3: compared descriptions differ
 */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;
export const EXIT_DIFFERENT = 3;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_FAILURE;
  }
}

/**
 * Map SDK errors to CLI exit codes
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof Error) {
    const name = error.name || error.constructor.name;

    if (name === "DescriptionFileNotFoundError") {
      return EXIT_NOT_FOUND;
    }
  }

  // Decode, read, write and unknown errors
  return EXIT_FAILURE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
