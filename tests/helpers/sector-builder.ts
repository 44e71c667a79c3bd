import { Readable, Writable } from "stream";

export const SECTOR_SIZE = 2352;
export const PAYLOAD_SIZE = 2048;

const SYNC_PATTERN = [
  0x00, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x00,
];

/**
 * Byte used for every region outside the payload window
 */
export const FILLER_BYTE = 0xee;

/**
 * Builds one raw sector whose payload window (for the given mode) is filled
 * with `fill`. Everything else after the header is FILLER_BYTE.
 */
export function buildSector(
  mode: number,
  fill: number,
  address: [number, number, number] = [0x00, 0x02, 0x00],
): Buffer {
  const sector = Buffer.alloc(SECTOR_SIZE, FILLER_BYTE);
  Buffer.from(SYNC_PATTERN).copy(sector, 0);
  sector[12] = address[0];
  sector[13] = address[1];
  sector[14] = address[2];
  sector[15] = mode;

  const dataOffset = mode === 0x02 ? 24 : 16;
  sector.fill(fill, dataOffset, dataOffset + PAYLOAD_SIZE);
  return sector;
}

/**
 * Splits a buffer into chunks of the given size
 */
export function chunked(buffer: Buffer, size: number): Readable {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < buffer.length; offset += size) {
    chunks.push(buffer.subarray(offset, offset + size));
  }
  return Readable.from(chunks);
}

/**
 * Writable that keeps everything written to it
 */
export class CollectingWritable extends Writable {
  private readonly chunks: Buffer[] = [];

  _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(Buffer.from(chunk));
    callback();
  }

  contents(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Writable whose writes fail after `okWrites` successful ones
 */
export class FailingWritable extends Writable {
  private writes = 0;

  constructor(
    private readonly okWrites: number,
    private readonly message: string = "disk full",
  ) {
    super();
    // Failed writes also surface as error events
    this.on("error", () => undefined);
  }

  _write(
    _chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (this.writes >= this.okWrites) {
      callback(new Error(this.message));
      return;
    }
    this.writes++;
    callback();
  }
}
