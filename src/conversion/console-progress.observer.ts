import { IProgressObserver } from "../clonecd/types";
import { TextSink } from "./types";

/**
 * Prints a single status line that is rewritten after every sector
 */
export class ConsoleProgressObserver implements IProgressObserver {
  private totalSectors: number | null = null;
  private hasOutput: boolean = false;

  constructor(private readonly output: TextSink) {}

  onStart(totalSectors: number | null): void {
    this.totalSectors = totalSectors && totalSectors > 0 ? totalSectors : null;
    this.hasOutput = false;
  }

  onSectorWritten(sectorCount: number): void {
    this.output.write(`${this.formatLine(sectorCount)}\r`);
    this.hasOutput = true;
  }

  onFinish(): void {
    // Move past the carriage-returned status line
    if (this.hasOutput) {
      this.output.write("\n");
      this.hasOutput = false;
    }
  }

  private formatLine(sectorCount: number): string {
    if (this.totalSectors === null) {
      return `Sector ${sectorCount} written`;
    }

    const percent = Math.min(
      100,
      Math.floor((sectorCount * 100) / this.totalSectors),
    );
    return `Sector ${sectorCount}/${this.totalSectors} written (${percent}%)`;
  }
}
