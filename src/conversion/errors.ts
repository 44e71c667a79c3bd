/**
 * Process exit codes of the command-line tool
 */
export enum CliExitCode {
  SUCCESS = 0,
  FAILURE = 1,
  USAGE = 2,
}

/**
 * Error thrown when the command line cannot be parsed.
 * Framework-agnostic error that the CLI layer turns into a usage message.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliUsageError);
    }
  }
}
