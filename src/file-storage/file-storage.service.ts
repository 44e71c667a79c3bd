import { Injectable, Logger } from "@nestjs/common";
import { randomBytes } from "crypto";
import { createWriteStream, WriteStream } from "fs";
import { FileHandle, open, rename, rm, stat } from "fs/promises";
import { basename, dirname, extname, join } from "path";
import { Readable } from "stream";
import {
  DestinationExistsError,
  DestinationReplaceError,
  REPLACE_DENIED_CODES,
  SourceNotFoundError,
  SourceOpenError,
  TemporaryFileError,
  isSystemError,
} from "./file-storage.errors";

/**
 * Extension given to converted images
 */
export const ISO_EXTENSION = ".iso";

/**
 * An opened image ready to be streamed
 */
export interface SourceImage {
  path: string;
  size: number;
  stream: Readable;
}

/**
 * A temporary file next to the final destination, written during conversion
 */
export interface TemporaryDestination {
  path: string;
  stream: WriteStream;
}

/**
 * Local file operations around a conversion.
 * Output is written to a temporary file and only moved over the destination
 * once the conversion has produced it completely.
 */
@Injectable()
export class FileStorageService {
  private readonly logger = new Logger(FileStorageService.name);

  /**
   * Opens an image for reading.
   *
   * @param path - Path of the image
   * @returns The image size and a stream over its bytes
   * @throws SourceNotFoundError if the file does not exist
   * @throws SourceOpenError if the file cannot be opened or is not a regular file
   */
  async openSource(path: string): Promise<SourceImage> {
    let handle: FileHandle;
    try {
      handle = await open(path, "r");
    } catch (error: unknown) {
      if (isSystemError(error, "ENOENT")) {
        throw new SourceNotFoundError(path);
      }
      throw new SourceOpenError(
        `Couldn't open ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
      );
    }

    const stats = await handle.stat();
    if (!stats.isFile()) {
      await handle.close();
      throw new SourceOpenError(`${path} is not a regular file`, path);
    }

    this.logger.debug(`Opened ${path} (${stats.size} bytes)`);

    return {
      path,
      size: stats.size,
      stream: handle.createReadStream(),
    };
  }

  /**
   * Works out where the converted image goes.
   *
   * @param imagePath - Path of the source image
   * @param isoPath - Explicit output path, if one was given
   * @returns The explicit path, or the image path with its extension replaced by .iso
   */
  resolveDestinationPath(imagePath: string, isoPath?: string): string {
    if (isoPath) {
      return isoPath;
    }

    const extension = extname(imagePath);
    const stem = extension ? imagePath.slice(0, -extension.length) : imagePath;
    return `${stem}${ISO_EXTENSION}`;
  }

  /**
   * Checks that the destination may be written.
   *
   * @param path - Final output path
   * @param force - Whether an existing file may be replaced
   * @throws DestinationExistsError if the file exists and force is not set
   */
  async assertDestinationAvailable(path: string, force: boolean): Promise<void> {
    if (force) {
      return;
    }

    try {
      await stat(path);
    } catch (error: unknown) {
      if (isSystemError(error, "ENOENT")) {
        return;
      }
      throw error;
    }

    throw new DestinationExistsError(path);
  }

  /**
   * Creates a uniquely named temporary file in the destination's directory,
   * so that the final rename stays on one filesystem.
   *
   * @param finalPath - Final output path
   * @returns The temporary path and an open write stream to it
   * @throws TemporaryFileError if the file cannot be created
   */
  async createTemporaryDestination(
    finalPath: string,
  ): Promise<TemporaryDestination> {
    const suffix = randomBytes(6).toString("hex");
    const path = join(dirname(finalPath), `.${basename(finalPath)}.${suffix}.tmp`);
    const stream = createWriteStream(path, { flags: "wx" });

    try {
      await new Promise<void>((resolve, reject) => {
        stream.once("ready", () => {
          stream.removeListener("error", reject);
          resolve();
        });
        stream.once("error", reject);
      });
    } catch (error: unknown) {
      throw new TemporaryFileError(
        `Couldn't create a temporary file next to ${finalPath}: ${error instanceof Error ? error.message : String(error)}`,
        path,
      );
    }

    // Write failures reach the converter through write callbacks
    stream.on("error", (error: Error) => {
      this.logger.debug(`Temporary file ${path} failed: ${error.message}`);
    });

    this.logger.debug(`Writing to temporary file ${path}`);
    return { path, stream };
  }

  /**
   * Flushes the temporary file and moves it over the destination.
   *
   * @param temporary - The temporary file written during conversion
   * @param finalPath - Final output path
   * @throws TemporaryFileError if the temporary file cannot be flushed
   * @throws DestinationReplaceError if the destination is locked or read-only
   */
  async commit(temporary: TemporaryDestination, finalPath: string): Promise<void> {
    try {
      await this.closeStream(temporary.stream);
    } catch (error: unknown) {
      await this.removeFile(temporary.path);
      throw new TemporaryFileError(
        `Couldn't finish writing ${temporary.path}: ${error instanceof Error ? error.message : String(error)}`,
        temporary.path,
      );
    }

    try {
      await rename(temporary.path, finalPath);
    } catch (error: unknown) {
      this.logger.error(
        `Failed to move ${temporary.path} to ${finalPath}`,
        error instanceof Error ? error.stack : String(error),
      );
      await this.removeFile(temporary.path);

      if (isSystemError(error) && error.code && REPLACE_DENIED_CODES.has(error.code)) {
        throw new DestinationReplaceError(finalPath);
      }
      throw new TemporaryFileError(
        `Couldn't move ${temporary.path} to ${finalPath}: ${error instanceof Error ? error.message : String(error)}`,
        temporary.path,
      );
    }

    this.logger.debug(`Saved ${finalPath}`);
  }

  /**
   * Closes and deletes the temporary file after a failed or cancelled conversion.
   *
   * @param temporary - The temporary file written during conversion
   * @throws TemporaryFileError if the file exists but cannot be removed
   */
  async discard(temporary: TemporaryDestination): Promise<void> {
    await this.destroyStream(temporary.stream);
    await this.removeFile(temporary.path);
    this.logger.debug(`Removed temporary file ${temporary.path}`);
  }

  private closeStream(stream: WriteStream): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (stream.closed) {
        const error = stream.errored;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
        return;
      }

      stream.once("close", () => {
        const error = stream.errored;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
      stream.end();
    });
  }

  private destroyStream(stream: WriteStream): Promise<void> {
    return new Promise<void>((resolve) => {
      if (stream.closed) {
        resolve();
        return;
      }

      stream.once("close", () => resolve());
      stream.destroy();
    });
  }

  private async removeFile(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error: unknown) {
      throw new TemporaryFileError(
        `Couldn't remove ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
      );
    }
  }
}
