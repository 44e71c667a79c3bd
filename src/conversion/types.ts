import { IProgressObserver } from "../clonecd/types";

/**
 * Domain request for converting one image file.
 * Framework-agnostic request that the CLI layer builds from its arguments.
 */
export interface ImageConversionRequest {
  imagePath: string;
  /**
   * Output path; derived from imagePath when omitted
   */
  isoPath?: string;
  force: boolean;
  progress?: IProgressObserver;
  signal?: AbortSignal;
}

/**
 * Domain result of a completed image conversion
 */
export interface ImageConversionResult {
  isoPath: string;
  sectorCount: number;
  bytesWritten: number;
}

/**
 * Anything text can be printed to, such as process.stdout
 */
export interface TextSink {
  write(text: string): unknown;
}
