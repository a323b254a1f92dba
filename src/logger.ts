/**
 * Console-backed logging.
 *
 * Components take a {@link Logger} so applications can route output
 * elsewhere; the default writes tagged lines to `console`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  error: 3,
  info: 1,
  silent: 4,
  warn: 2,
};

/** Leveled logging methods used throughout the client. */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Subset of `console` the logger writes to (injectable for tests). */
export type ConsoleLike = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface LoggerOptions {
  /** Minimum level written. Default `info`. */
  level?: LogLevel;
  /** Prefix for every line. Default `pigpio`. */
  tag?: string;
  sink?: ConsoleLike;
}

/** Return true when `value` names a log level. */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Create a logger writing `[tag] message` lines to `sink` for every message
 * at or above `level`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = "info", tag = "pigpio", sink = console } = options;
  const threshold = LEVEL_ORDER[level];
  const write =
    (at: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[at] < threshold) return;
      sink[at](`[${tag}] ${message}`, ...details);
    };
  return {
    debug: write("debug"),
    error: write("error"),
    info: write("info"),
    warn: write("warn"),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });
