/**
 * Environment settings read through ConfigService
 */
export const CONFIG_KEYS = {
  PROGRESS: "CCD2ISO_PROGRESS",
  LOG_LEVEL: "CCD2ISO_LOG_LEVEL",
} as const;

const FALSE_VALUES: ReadonlySet<string> = new Set(["0", "false", "no", "off"]);

/**
 * Interprets an on/off setting; unset means on
 */
export function isEnabled(value: string | undefined): boolean {
  if (value === undefined) {
    return true;
  }
  return !FALSE_VALUES.has(value.trim().toLowerCase());
}

/**
 * Injection token for the text sink the CLI prints to
 */
export const CLI_OUTPUT = "CLI_OUTPUT";
