import { SECTOR_LAYOUT } from "./consts";

/**
 * Error codes specific to CloneCD image conversion
 * This module is framework-agnostic and does not depend on NestJS
 */
export enum ConversionErrorCode {
  INCOMPLETE_SECTOR = "INCOMPLETE_SECTOR",
  SESSION_MARKER = "SESSION_MARKER",
  UNRECOGNIZED_SECTOR_MODE = "UNRECOGNIZED_SECTOR_MODE",
  DESTINATION_WRITE_FAILED = "DESTINATION_WRITE_FAILED",
  SOURCE_READ_FAILED = "SOURCE_READ_FAILED",
  CANCELLED = "CANCELLED",
}

/**
 * Base error class for conversion errors.
 * Every conversion error stops the conversion at the sector given by `index`.
 */
export class ConversionError extends Error {
  constructor(
    public readonly code: ConversionErrorCode,
    public readonly index: number,
    message: string,
  ) {
    super(message);
    this.name = "ConversionError";
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConversionError);
    }
  }
}

/**
 * Error thrown when the source ends partway through a sector
 */
export class IncompleteSectorError extends ConversionError {
  constructor(
    index: number,
    public readonly bytesRead: number,
    public readonly expected: number = SECTOR_LAYOUT.SECTOR_SIZE,
  ) {
    super(
      ConversionErrorCode.INCOMPLETE_SECTOR,
      index,
      `Sector ${index} is incomplete, with only ${bytesRead} bytes instead of ${expected}.`,
    );
    this.name = "IncompleteSectorError";
  }
}

/**
 * Error thrown when a session marker sector is reached.
 * The sectors before it make up the first session of the disc.
 */
export class SessionMarkerError extends ConversionError {
  constructor(index: number) {
    super(
      ConversionErrorCode.SESSION_MARKER,
      index,
      "Found a session marker, this image might contain multisession data. Only the first session was exported.",
    );
    this.name = "SessionMarkerError";
  }
}

/**
 * Error thrown when a sector's mode byte is not one the converter supports
 */
export class UnrecognizedSectorModeError extends ConversionError {
  constructor(
    index: number,
    public readonly mode: number,
  ) {
    super(
      ConversionErrorCode.UNRECOGNIZED_SECTOR_MODE,
      index,
      `Unrecognized sector mode (${mode.toString(16)}) at sector ${index}!`,
    );
    this.name = "UnrecognizedSectorModeError";
  }
}

/**
 * Error thrown when a payload cannot be written to the destination
 */
export class DestinationWriteError extends ConversionError {
  constructor(
    index: number,
    public readonly originalError: Error,
  ) {
    super(
      ConversionErrorCode.DESTINATION_WRITE_FAILED,
      index,
      `Failed to write sector ${index}: ${originalError.message}`,
    );
    this.name = "DestinationWriteError";
  }
}

/**
 * Error thrown when the source stream fails, as opposed to ending
 */
export class SourceReadError extends ConversionError {
  constructor(
    index: number,
    public readonly originalError: Error,
  ) {
    super(
      ConversionErrorCode.SOURCE_READ_FAILED,
      index,
      `Failed to read sector ${index}: ${originalError.message}`,
    );
    this.name = "SourceReadError";
  }
}

/**
 * Error thrown when the caller aborts the conversion
 */
export class ConversionCancelledError extends ConversionError {
  constructor(index: number) {
    super(
      ConversionErrorCode.CANCELLED,
      index,
      `Conversion cancelled before sector ${index}`,
    );
    this.name = "ConversionCancelledError";
  }
}

/**
 * Normalizes a thrown value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
