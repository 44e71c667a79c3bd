import { CliUsageError } from "./errors";

export const PROGRAM_NAME = "ccd2iso";

export const USAGE = `usage: ${PROGRAM_NAME} [-f] [-?] [-v] img [iso]`;

export const HELP_TEXT = `${USAGE}

Convert CloneCD .img files to ISO 9660 .iso files.

positional arguments:
  img             .img file to convert
  iso             filepath for the output .iso file

optional arguments:
  -f, --force     overwrite the .iso file if it already exists
  -?, -h, --help  show this help message and exit
  -v, --version   show program's version number and exit
`;

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "convert"; imagePath: string; isoPath?: string; force: boolean };

/**
 * Parses the command line (without the node and script entries).
 * Help and version flags win as soon as they are seen; no arguments at all
 * also asks for help.
 *
 * @param args - Arguments as given on the command line
 * @returns The command to run
 * @throws CliUsageError for unknown options or a wrong number of paths
 */
export function parseCliArguments(args: readonly string[]): CliCommand {
  if (args.length === 0) {
    return { kind: "help" };
  }

  const positionals: string[] = [];
  let force = false;
  let optionsEnded = false;

  for (const arg of args) {
    if (optionsEnded || arg === "-" || !arg.startsWith("-")) {
      positionals.push(arg);
      continue;
    }

    switch (arg) {
      case "--":
        optionsEnded = true;
        break;
      case "-f":
      case "--force":
        force = true;
        break;
      case "-?":
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-v":
      case "--version":
        return { kind: "version" };
      default:
        throw new CliUsageError(`unrecognized arguments: ${arg}`);
    }
  }

  if (positionals.length === 0) {
    throw new CliUsageError("the following arguments are required: img");
  }

  if (positionals.length > 2) {
    throw new CliUsageError(
      `unrecognized arguments: ${positionals.slice(2).join(" ")}`,
    );
  }

  const [imagePath, isoPath] = positionals;
  return isoPath === undefined
    ? { kind: "convert", imagePath, force }
    : { kind: "convert", imagePath, isoPath, force };
}
