/**
 * Error codes specific to file storage operations
 * This module is framework-agnostic and does not depend on NestJS
 */
export enum FileStorageErrorCode {
  SOURCE_NOT_FOUND = "SOURCE_NOT_FOUND",
  SOURCE_OPEN_ERROR = "SOURCE_OPEN_ERROR",
  DESTINATION_EXISTS = "DESTINATION_EXISTS",
  TEMPORARY_FILE_ERROR = "TEMPORARY_FILE_ERROR",
  DESTINATION_REPLACE_ERROR = "DESTINATION_REPLACE_ERROR",
}

/**
 * Base error class for file storage errors
 * Framework-agnostic error that can be caught and converted to user-facing messages
 */
export class FileStorageError extends Error {
  constructor(
    public readonly code: FileStorageErrorCode,
    message: string,
    public readonly path?: string,
  ) {
    super(message);
    this.name = "FileStorageError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FileStorageError);
    }
  }
}

/**
 * Error thrown when the image to convert does not exist
 */
export class SourceNotFoundError extends FileStorageError {
  constructor(path: string) {
    super(
      FileStorageErrorCode.SOURCE_NOT_FOUND,
      `Couldn't find the file ${path}`,
      path,
    );
    this.name = "SourceNotFoundError";
  }
}

/**
 * Error thrown when the image exists but cannot be opened for reading
 */
export class SourceOpenError extends FileStorageError {
  constructor(message: string, path: string) {
    super(FileStorageErrorCode.SOURCE_OPEN_ERROR, message, path);
    this.name = "SourceOpenError";
  }
}

/**
 * Error thrown when the output file exists and overwriting was not requested
 */
export class DestinationExistsError extends FileStorageError {
  constructor(path: string) {
    super(
      FileStorageErrorCode.DESTINATION_EXISTS,
      `${path} already exists, pass --force if you want to overwrite it.`,
      path,
    );
    this.name = "DestinationExistsError";
  }
}

/**
 * Error thrown when the temporary output file cannot be created, flushed or removed
 */
export class TemporaryFileError extends FileStorageError {
  constructor(message: string, path: string) {
    super(FileStorageErrorCode.TEMPORARY_FILE_ERROR, message, path);
    this.name = "TemporaryFileError";
  }
}

/**
 * Error thrown when the finished output cannot be moved over the destination
 */
export class DestinationReplaceError extends FileStorageError {
  constructor(path: string) {
    super(
      FileStorageErrorCode.DESTINATION_REPLACE_ERROR,
      `Couldn't overwrite ${path}`,
      path,
    );
    this.name = "DestinationReplaceError";
  }
}

/**
 * Type guard for errors raised by Node's fs layer, optionally matching an errno code
 */
export function isSystemError(
  error: unknown,
  code?: string,
): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }

  return typeof error.code === "string" && (code === undefined || error.code === code);
}

/**
 * Errno codes raised when a file is locked or write-protected
 */
export const REPLACE_DENIED_CODES: ReadonlySet<string> = new Set([
  "EPERM",
  "EACCES",
  "EBUSY",
]);
