import { Injectable, Logger } from "@nestjs/common";
import { Readable, Writable } from "stream";
import { SECTOR_LAYOUT } from "./consts";
import { decodeSector } from "./sector-layout";
import { SectorReader } from "./sector-reader";
import {
  ConversionOptions,
  ConversionResult,
  ISectorReader,
  SectorChunk,
  SectorKind,
  SectorRecord,
} from "./types";
import {
  ConversionCancelledError,
  DestinationWriteError,
  IncompleteSectorError,
  SessionMarkerError,
  SourceReadError,
  UnrecognizedSectorModeError,
  toError,
} from "./clonecd.errors";

/**
 * Converts a CloneCD raw image stream into an ISO 9660 stream.
 * Sectors are handled strictly one at a time: read, decode, write the
 * 2048-byte payload, report progress.
 */
@Injectable()
export class ConversionEngineService {
  private readonly logger = new Logger(ConversionEngineService.name);

  /**
   * Copies the user-data payload of every sector from source to destination.
   * The destination is neither ended nor cleaned up; that belongs to the caller.
   *
   * @param source - CloneCD image bytes (typically a .img file)
   * @param destination - Stream receiving the ISO 9660 bytes
   * @param options - Progress observer, abort signal and known sector total
   * @returns Number of sectors converted and bytes written
   * @throws ConversionError subclasses for every terminal condition other than a clean end of stream
   */
  async convert(
    source: Readable,
    destination: Writable,
    options: ConversionOptions = {},
  ): Promise<ConversionResult> {
    const { progress, signal, totalSectors = null } = options;
    const reader = new SectorReader(source);
    let sectorCount = 0;

    const onDestinationError = (error: Error) => {
      this.logger.debug(`Destination stream error: ${error.message}`);
    };
    destination.on("error", onDestinationError);

    progress?.onStart(totalSectors);

    try {
      while (true) {
        if (signal?.aborted) {
          throw new ConversionCancelledError(sectorCount);
        }

        const chunk = await this.readSector(reader, sectorCount);
        if (chunk === null) {
          break;
        }

        if (chunk.bytes.length < SECTOR_LAYOUT.SECTOR_SIZE) {
          throw new IncompleteSectorError(chunk.index, chunk.bytes.length);
        }

        const payload = this.selectPayload(decodeSector(chunk.bytes), chunk.index);
        await this.writePayload(destination, payload, chunk.index);

        sectorCount++;
        progress?.onSectorWritten(sectorCount);
      }
    } finally {
      reader.dispose();
      destination.removeListener("error", onDestinationError);
      progress?.onFinish();
    }

    this.logger.debug(`Converted ${sectorCount} sectors`);

    return {
      sectorCount,
      bytesWritten: sectorCount * SECTOR_LAYOUT.PAYLOAD_SIZE,
    };
  }

  /**
   * Picks the payload window for a decoded sector, or stops the conversion
   * for sectors that carry no exportable data
   */
  private selectPayload(sector: SectorRecord, index: number): Buffer {
    switch (sector.kind) {
      case SectorKind.Mode1:
        return sector.data;
      case SectorKind.Mode2:
        return sector.data;
      case SectorKind.SessionMarker:
        throw new SessionMarkerError(index);
      case SectorKind.Unrecognized:
        throw new UnrecognizedSectorModeError(index, sector.mode);
    }
  }

  private async readSector(
    reader: ISectorReader,
    index: number,
  ): Promise<SectorChunk | null> {
    try {
      return await reader.next();
    } catch (error: unknown) {
      throw new SourceReadError(index, toError(error));
    }
  }

  private writePayload(
    destination: Writable,
    payload: Buffer,
    index: number,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      destination.write(payload, (error?: Error | null) => {
        if (error) {
          reject(new DestinationWriteError(index, error));
          return;
        }
        resolve();
      });
    });
  }
}
