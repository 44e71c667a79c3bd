import { LogLevel } from "@nestjs/common";

/**
 * Nest log levels from most to least severe
 */
const LOG_LEVEL_ORDER: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "log",
  "debug",
  "verbose",
];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Expands a threshold level name into the list of levels Nest should print
 * @param value - Level name such as "debug"; unknown or unset values use the default
 * @returns Every level at least as severe as the threshold
 */
export function resolveLogLevels(value: string | undefined): LogLevel[] {
  const requested = value?.trim().toLowerCase();
  const threshold = LOG_LEVEL_ORDER.find((level) => level === requested);
  const index = LOG_LEVEL_ORDER.indexOf(threshold ?? DEFAULT_LOG_LEVEL);
  return LOG_LEVEL_ORDER.slice(0, index + 1);
}
