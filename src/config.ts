/**
 * Connection configuration: explicit options first, then the environment
 * (`PIGPIO_ADDR`, `PIGPIO_PORT`, `PIGPIO_LOG_LEVEL`), then defaults.
 */

import { DEFAULT_PORT } from "./commands.ts";
import { isLogLevel, type LogLevel } from "./logger.ts";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_CONNECT_TIMEOUT = 10_000;

/** Options a caller may pass to `connect()`. */
export interface ConnectionOptions {
  host?: string;
  port?: number;
  /** Identifier handed to callbacks. Default `host:port`. */
  id?: string;
  /** Connect timeout per socket (ms). */
  connectTimeout?: number;
  logLevel?: LogLevel;
}

/** Fully resolved connection settings. */
export interface ConnectionConfig {
  host: string;
  port: number;
  id: string;
  connectTimeout: number;
  logLevel: LogLevel;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function parsePort(raw: string | number): number {
  const port = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`Invalid port: ${String(raw)}`);
  }
  return port;
}

/**
 * Merge options with the environment and defaults.
 *
 * @throws RangeError on an invalid port, timeout or log level.
 */
export function resolveConnectionConfig(
  options: ConnectionOptions = {},
  env: Environment = process.env,
): ConnectionConfig {
  const host = options.host ?? (env.PIGPIO_ADDR?.trim() || DEFAULT_HOST);
  const port = parsePort(options.port ?? env.PIGPIO_PORT ?? DEFAULT_PORT);

  const connectTimeout = options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
  if (!Number.isFinite(connectTimeout) || connectTimeout <= 0) {
    throw new RangeError(`Invalid connect timeout: ${connectTimeout}`);
  }

  const rawLevel = options.logLevel ?? env.PIGPIO_LOG_LEVEL ?? "info";
  if (!isLogLevel(rawLevel)) {
    throw new RangeError(`Invalid log level: ${rawLevel}`);
  }

  return {
    connectTimeout,
    host,
    id: options.id ?? `${host}:${port}`,
    logLevel: rawLevel,
    port,
  };
}
