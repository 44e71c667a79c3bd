/**
 * Interpretation selected by a sector's mode byte
 */
export enum SectorKind {
  Mode1 = "MODE1",
  Mode2 = "MODE2",
  SessionMarker = "SESSION_MARKER",
  Unrecognized = "UNRECOGNIZED",
}

/**
 * Minute/second/frame address bytes, kept exactly as stored
 */
export interface SectorAddress {
  minute: number;
  second: number;
  frame: number;
}

interface SectorHeader {
  /**
   * 12-byte synchronization pattern
   */
  sync: Buffer;
  address: SectorAddress;
  /**
   * Raw mode byte from the header
   */
  mode: number;
}

export interface Mode1Sector extends SectorHeader {
  kind: SectorKind.Mode1;
  data: Buffer;
  edc: Buffer;
  reserved: Buffer;
  ecc: Buffer;
}

export interface Mode2Sector extends SectorHeader {
  kind: SectorKind.Mode2;
  subheader: Buffer;
  data: Buffer;
  edc: Buffer;
  ecc: Buffer;
}

export interface SessionMarkerSector extends SectorHeader {
  kind: SectorKind.SessionMarker;
}

export interface UnrecognizedSector extends SectorHeader {
  kind: SectorKind.Unrecognized;
}

/**
 * A decoded 2352-byte sector record. Byte fields are views into the
 * buffer the record was decoded from.
 */
export type SectorRecord =
  | Mode1Sector
  | Mode2Sector
  | SessionMarkerSector
  | UnrecognizedSector;

/**
 * One record-sized read from the source stream
 */
export interface SectorChunk {
  /**
   * Zero-based position of the record in the stream
   */
  index: number;

  /**
   * Bytes read; shorter than a sector only for a truncated tail
   */
  bytes: Buffer;
}

/**
 * Interface for reading fixed-size sector records from a stream
 */
export interface ISectorReader {
  /**
   * Gets the next record from the reader
   * @returns Promise that resolves to the next chunk, or null at a clean end of stream
   */
  next(): Promise<SectorChunk | null>;

  /**
   * Detaches the reader from its stream
   */
  dispose(): void;
}

/**
 * Observer notified as sectors are converted
 */
export interface IProgressObserver {
  /**
   * Called once before the first sector is read
   * @param totalSectors - Sector count when known from the source size, null otherwise
   */
  onStart(totalSectors: number | null): void;

  /**
   * Called after each sector payload has been written
   * @param sectorCount - Number of sectors written so far
   */
  onSectorWritten(sectorCount: number): void;

  /**
   * Called once when the conversion stops, whether it succeeded or not
   */
  onFinish(): void;
}

export interface ConversionOptions {
  progress?: IProgressObserver;
  /**
   * Checked before each sector is read
   */
  signal?: AbortSignal;
  totalSectors?: number | null;
}

export interface ConversionResult {
  sectorCount: number;
  bytesWritten: number;
}
