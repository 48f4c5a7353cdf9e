import type { Logger, LogLevel } from "./interfaces";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Map a repeated -v count to a log level.
 *
 * @example levelFromVerbosity(0) → "info"
 * @example levelFromVerbosity(2) → "debug"
 */
export function levelFromVerbosity(verbosity: number): LogLevel {
  return verbosity > 0 ? "debug" : "info";
}

/**
 * Console-backed logger with a minimum level.
 * Warnings and errors go to stderr so stdout stays clean for scripting.
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug(message: string): void {
      if (enabled("debug")) console.log(`[debug] ${message}`);
    },
    info(message: string): void {
      if (enabled("info")) console.log(message);
    },
    warn(message: string): void {
      if (enabled("warn")) console.error(`[warn] ${message}`);
    },
    error(message: string): void {
      if (enabled("error")) console.error(`[error] ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
