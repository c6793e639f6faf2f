/**
 * BatchRunError
 *
 * Base error class for batch failures that happen before any document is
 * processed.
 */
export class BatchRunError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BatchRunError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * DirectoryNotFoundError
 *
 * The input directory does not exist or is not a directory.
 */
export class DirectoryNotFoundError extends BatchRunError {
  constructor(public readonly directory: string) {
    super(`Input directory not found: ${directory}`);
    this.name = 'DirectoryNotFoundError';
  }
}

/**
 * NoInputError
 *
 * The input directory holds no document with the expected extension.
 */
export class NoInputError extends BatchRunError {
  constructor(
    public readonly directory: string,
    public readonly extension: string,
  ) {
    super(`No ${extension} files found in: ${directory}`);
    this.name = 'NoInputError';
  }
}
