import { Injectable, Logger } from "@nestjs/common";
import { ConversionEngineService } from "../clonecd/conversion-engine.service";
import { SessionMarkerError } from "../clonecd/clonecd.errors";
import { SECTOR_LAYOUT } from "../clonecd/consts";
import { FileStorageService } from "../file-storage/file-storage.service";
import { ImageConversionRequest, ImageConversionResult } from "./types";

/**
 * Number of sector records an image of the given size holds,
 * counting a truncated tail as one
 */
export function countSectors(sizeInBytes: number): number {
  return Math.ceil(sizeInBytes / SECTOR_LAYOUT.SECTOR_SIZE);
}

/**
 * Service responsible for converting image files.
 * Wires the conversion engine to the source file and a temporary destination
 * that is committed on success and discarded on failure.
 */
@Injectable()
export class ImageConversionService {
  private readonly logger = new Logger(ImageConversionService.name);

  constructor(
    private readonly fileStorageService: FileStorageService,
    private readonly conversionEngine: ConversionEngineService,
  ) {}

  /**
   * Converts a CloneCD image file to an ISO 9660 file.
   *
   * @param request - Paths, overwrite flag, progress observer and abort signal
   * @returns Where the ISO was written and how much was converted
   * @throws FileStorageError when the source or destination cannot be used
   * @throws ConversionError when the conversion stops before a clean end of the image;
   * after a SessionMarkerError the sectors before the marker have been saved
   */
  async convertImage(
    request: ImageConversionRequest,
  ): Promise<ImageConversionResult> {
    const isoPath = this.fileStorageService.resolveDestinationPath(
      request.imagePath,
      request.isoPath,
    );

    const source = await this.fileStorageService.openSource(request.imagePath);

    try {
      await this.fileStorageService.assertDestinationAvailable(
        isoPath,
        request.force,
      );
      const temporary =
        await this.fileStorageService.createTemporaryDestination(isoPath);

      try {
        const result = await this.conversionEngine.convert(
          source.stream,
          temporary.stream,
          {
            progress: request.progress,
            signal: request.signal,
            totalSectors: countSectors(source.size),
          },
        );

        await this.fileStorageService.commit(temporary, isoPath);
        this.logger.debug(
          `Converted ${request.imagePath} to ${isoPath} (${result.sectorCount} sectors)`,
        );

        return { isoPath, ...result };
      } catch (error: unknown) {
        // The first session is complete; keep it
        if (error instanceof SessionMarkerError) {
          await this.fileStorageService.commit(temporary, isoPath);
          this.logger.debug(
            `Saved ${error.index} sectors of ${request.imagePath} before a session marker`,
          );
          throw error;
        }

        await this.fileStorageService.discard(temporary);
        throw error;
      }
    } finally {
      source.stream.destroy();
    }
  }
}
