import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  ConversionCancelledError,
  ConversionError,
  SessionMarkerError,
} from "../clonecd/clonecd.errors";
import {
  DestinationReplaceError,
  FileStorageError,
} from "../file-storage/file-storage.errors";
import {
  CliCommand,
  HELP_TEXT,
  PROGRAM_NAME,
  USAGE,
  parseCliArguments,
} from "./cli-arguments";
import { CLI_OUTPUT, CONFIG_KEYS, isEnabled } from "./config";
import { ConsoleProgressObserver } from "./console-progress.observer";
import { CliExitCode, CliUsageError } from "./errors";
import { ImageConversionService } from "./image-conversion.service";
import { readPackageVersion } from "./package-version";
import { TextSink } from "./types";

/**
 * Command-line front end.
 * Converts domain errors into messages and exit codes.
 */
@Injectable()
export class ConversionCliService {
  private readonly logger = new Logger(ConversionCliService.name);

  constructor(
    private readonly imageConversionService: ImageConversionService,
    private readonly configService: ConfigService,
    @Inject(CLI_OUTPUT) private readonly output: TextSink,
  ) {}

  /**
   * Runs one invocation of the tool.
   *
   * @param args - Command-line arguments without the node and script entries
   * @returns The process exit code
   */
  async run(args: readonly string[]): Promise<CliExitCode> {
    let command: CliCommand;
    try {
      command = parseCliArguments(args);
    } catch (error) {
      if (error instanceof CliUsageError) {
        this.print(USAGE);
        this.print(`${PROGRAM_NAME}: error: ${error.message}`);
        return CliExitCode.USAGE;
      }
      throw error;
    }

    switch (command.kind) {
      case "help":
        this.output.write(HELP_TEXT);
        return CliExitCode.SUCCESS;
      case "version":
        this.print(`${PROGRAM_NAME} ${readPackageVersion()}`);
        return CliExitCode.SUCCESS;
      case "convert":
        return this.convert(command.imagePath, command.isoPath, command.force);
    }
  }

  private async convert(
    imagePath: string,
    isoPath: string | undefined,
    force: boolean,
  ): Promise<CliExitCode> {
    const abortController = new AbortController();
    const onInterrupt = () => abortController.abort();
    process.once("SIGINT", onInterrupt);

    const progress = isEnabled(
      this.configService.get<string>(CONFIG_KEYS.PROGRESS),
    )
      ? new ConsoleProgressObserver(this.output)
      : undefined;

    try {
      const result = await this.imageConversionService.convertImage({
        imagePath,
        isoPath,
        force,
        progress,
        signal: abortController.signal,
      });
      this.logger.debug(
        `Wrote ${result.bytesWritten} bytes to ${result.isoPath}`,
      );
      this.print("Done.");
      return CliExitCode.SUCCESS;
    } catch (error) {
      return this.report(error);
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  }

  /**
   * Prints the message for a failed conversion
   */
  private report(error: unknown): CliExitCode {
    if (error instanceof ConversionCancelledError) {
      this.print("Cancelled.");
      return CliExitCode.FAILURE;
    }

    if (error instanceof SessionMarkerError) {
      this.print(error.message);
      return CliExitCode.FAILURE;
    }

    if (error instanceof ConversionError) {
      this.print(`Error: ${error.message}`);
      return CliExitCode.FAILURE;
    }

    if (error instanceof DestinationReplaceError) {
      this.print(`Error: ${error.message}`);
      this.print("The .iso file might be mounted or marked read-only.");
      return CliExitCode.FAILURE;
    }

    if (error instanceof FileStorageError) {
      this.print(`Error: ${error.message}`);
      return CliExitCode.FAILURE;
    }

    // Unknown errors are left to the entry point
    this.logger.error(
      "Unexpected error during conversion",
      error instanceof Error ? error.stack : String(error),
    );
    throw error;
  }

  private print(line: string): void {
    this.output.write(`${line}\n`);
  }
}
