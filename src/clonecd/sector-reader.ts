import { Readable } from "stream";
import { SECTOR_LAYOUT } from "./consts";
import { ISectorReader, SectorChunk } from "./types";

/**
 * Reads fixed-size sector records from a stream
 * Handles stream traversal: event handling, chunk reassembly, flow control.
 * At most one record plus one incoming chunk is buffered at a time.
 */
export class SectorReader implements ISectorReader {
  private buffer: Buffer = Buffer.alloc(0);
  private nextIndex: number = 0;
  private isEnded: boolean = false;
  private pendingResolve: ((value: SectorChunk | null) => void) | null = null;
  private pendingReject: ((reason: Error) => void) | null = null;
  private streamError: Error | null = null;

  private readonly onData = (chunk: Buffer): void => {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    // Hold the stream until the buffered records have been taken
    if (this.buffer.length >= this.recordSize) {
      this.stream.pause();
    }

    this.settlePending();
  };

  private readonly onEnd = (): void => {
    this.isEnded = true;
    this.settlePending();
  };

  private readonly onError = (error: Error): void => {
    this.streamError = error;
    if (this.pendingReject) {
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;
      reject(error);
    }
  };

  constructor(
    private readonly stream: Readable,
    private readonly recordSize: number = SECTOR_LAYOUT.SECTOR_SIZE,
  ) {
    this.stream.on("data", this.onData);
    this.stream.on("end", this.onEnd);
    this.stream.on("error", this.onError);

    // Resume stream if it's paused
    if (this.stream.isPaused()) {
      this.stream.resume();
    }
  }

  /**
   * Gets the next record from the stream
   * @returns Promise that resolves to the next chunk, or null once the stream has ended cleanly
   */
  async next(): Promise<SectorChunk | null> {
    if (this.streamError) {
      throw this.streamError;
    }

    const immediate = this.takeRecord();
    if (immediate) {
      return immediate;
    }

    if (this.isEnded) {
      return null;
    }

    // Wait for more data or stream end
    return new Promise<SectorChunk | null>((resolve, reject) => {
      if (this.pendingResolve) {
        reject(new Error("Multiple concurrent calls to next() are not supported"));
        return;
      }

      this.pendingResolve = resolve;
      this.pendingReject = reject;
      this.resumeIfStarved();
    });
  }

  /**
   * Removes the reader's listeners from the stream
   */
  dispose(): void {
    this.stream.removeListener("data", this.onData);
    this.stream.removeListener("end", this.onEnd);
    this.stream.removeListener("error", this.onError);
    this.buffer = Buffer.alloc(0);
  }

  private settlePending(): void {
    if (!this.pendingResolve) {
      return;
    }

    const record = this.takeRecord();
    if (record || this.isEnded) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve(record);
    }
  }

  private takeRecord(): SectorChunk | null {
    let bytes: Buffer;

    if (this.buffer.length >= this.recordSize) {
      bytes = this.buffer.subarray(0, this.recordSize);
      this.buffer = this.buffer.subarray(this.recordSize);
    } else if (this.isEnded && this.buffer.length > 0) {
      // Truncated tail, handed over as-is
      bytes = this.buffer;
      this.buffer = Buffer.alloc(0);
    } else {
      return null;
    }

    this.resumeIfStarved();
    return { index: this.nextIndex++, bytes };
  }

  private resumeIfStarved(): void {
    if (
      !this.isEnded &&
      this.buffer.length < this.recordSize &&
      this.stream.isPaused()
    ) {
      this.stream.resume();
    }
  }
}
