import {
  MODE1_LAYOUT,
  MODE2_LAYOUT,
  SECTOR_LAYOUT,
  SECTOR_MODES,
} from "./consts";
import { SectorAddress, SectorKind, SectorRecord } from "./types";

function view(buffer: Buffer, offset: number, size: number): Buffer {
  return buffer.subarray(offset, offset + size);
}

/**
 * Reads the mode byte of a sector record
 * @param buffer - Buffer starting at the first byte of the record
 * @returns The raw mode value
 */
export function readSectorMode(buffer: Buffer): number {
  if (buffer.length <= SECTOR_LAYOUT.MODE_OFFSET) {
    throw new RangeError(
      `Sector header needs ${SECTOR_LAYOUT.HEADER_SIZE} bytes, got ${buffer.length}`,
    );
  }
  return buffer[SECTOR_LAYOUT.MODE_OFFSET];
}

/**
 * Decodes a raw CloneCD sector record.
 * The payload window is chosen by the mode byte; nothing is copied.
 *
 * @param buffer - Exactly one 2352-byte sector
 * @returns The sector, tagged by the kind its mode byte selects
 * @throws RangeError if the buffer is not exactly one sector long
 */
export function decodeSector(buffer: Buffer): SectorRecord {
  if (buffer.length !== SECTOR_LAYOUT.SECTOR_SIZE) {
    throw new RangeError(
      `Sector record must be ${SECTOR_LAYOUT.SECTOR_SIZE} bytes, got ${buffer.length}`,
    );
  }

  const sync = view(buffer, SECTOR_LAYOUT.SYNC_OFFSET, SECTOR_LAYOUT.SYNC_SIZE);
  const address: SectorAddress = {
    minute: buffer[SECTOR_LAYOUT.ADDRESS_MINUTE_OFFSET],
    second: buffer[SECTOR_LAYOUT.ADDRESS_SECOND_OFFSET],
    frame: buffer[SECTOR_LAYOUT.ADDRESS_FRAME_OFFSET],
  };
  const mode = readSectorMode(buffer);

  switch (mode) {
    case SECTOR_MODES.MODE1:
      return {
        kind: SectorKind.Mode1,
        sync,
        address,
        mode,
        data: view(buffer, MODE1_LAYOUT.DATA_OFFSET, SECTOR_LAYOUT.PAYLOAD_SIZE),
        edc: view(buffer, MODE1_LAYOUT.EDC_OFFSET, SECTOR_LAYOUT.EDC_SIZE),
        reserved: view(
          buffer,
          MODE1_LAYOUT.RESERVED_OFFSET,
          MODE1_LAYOUT.RESERVED_SIZE,
        ),
        ecc: view(buffer, MODE1_LAYOUT.ECC_OFFSET, SECTOR_LAYOUT.ECC_SIZE),
      };
    case SECTOR_MODES.MODE2:
      return {
        kind: SectorKind.Mode2,
        sync,
        address,
        mode,
        subheader: view(
          buffer,
          MODE2_LAYOUT.SUBHEADER_OFFSET,
          MODE2_LAYOUT.SUBHEADER_SIZE,
        ),
        data: view(buffer, MODE2_LAYOUT.DATA_OFFSET, SECTOR_LAYOUT.PAYLOAD_SIZE),
        edc: view(buffer, MODE2_LAYOUT.EDC_OFFSET, SECTOR_LAYOUT.EDC_SIZE),
        ecc: view(buffer, MODE2_LAYOUT.ECC_OFFSET, SECTOR_LAYOUT.ECC_SIZE),
      };
    case SECTOR_MODES.SESSION_MARKER:
      return { kind: SectorKind.SessionMarker, sync, address, mode };
    default:
      return { kind: SectorKind.Unrecognized, sync, address, mode };
  }
}
