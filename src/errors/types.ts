/**
 * Error type definitions for the chunking library
 *
 * These custom error classes provide:
 * - Messages with recovery hints
 * - Numeric codes identifying the error kind
 * - Type safety for error handling logic
 */

/**
 * Base class for all library errors.
 */
export class ChunkerLibError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Error kind: 1 general, 2 config, 3 file not found, 6 chunking */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ChunkerLibError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Code 3: File not found
 */
export class FileNotFoundError extends ChunkerLibError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration file errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Out-of-range values in the [chunk] table
 *
 * Code 2: Configuration error
 */
export class ConfigError extends ChunkerLibError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Check the [chunk] table of your config file', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Code 1: General error (validation is user input error)
 */
export class ValidationError extends ChunkerLibError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0 ? `Issues:\n  ${issues.join('\n  ')}` : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when chunking a document fails unexpectedly.
 *
 * The only failure a chunker reports: callers never receive a partial
 * chunk list alongside it.
 *
 * Code 6: Chunking error
 */
export class ChunkError extends ChunkerLibError {
  /** Document that was being chunked */
  public readonly docId: string;

  /** The original failure for debugging */
  declare readonly cause: Error;

  constructor(docId: string, cause: unknown) {
    const error = cause instanceof Error ? cause : new Error(String(cause));
    super(
      `Failed to chunk document ${docId}: ${error.message}`,
      'The document content may be malformed; re-run the parser for this document',
      6
    );
    this.name = 'ChunkError';
    this.docId = docId;
    this.cause = error;
  }
}
