/**
 * Error types for pigpio client operations and the daemon error-code table.
 *
 * Transport and framing failures are errors; negative daemon results are
 * ordinary return values, which {@link DaemonError} wraps only where a caller
 * cannot continue without a valid result (e.g. opening notifications).
 */

import {
  createErr,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";

/** Daemon error codes (negative results) and their meaning. */
export const DAEMON_ERROR_CODES: Readonly<Record<number, string>> = {
  [-1]: "Initialisation failed",
  [-2]: "GPIO not 0-31",
  [-3]: "GPIO not 0-53",
  [-4]: "Mode not 0-7",
  [-5]: "Level not 0-1",
  [-6]: "Pull up/down not 0-2",
  [-15]: "Watchdog timeout not 0-60000",
  [-24]: "No handle available",
  [-25]: "Unknown handle",
  [-41]: "GPIO operation not permitted",
  [-42]: "One or more GPIO not permitted",
  [-46]: "Trigger pulse length not 1-100",
  [-76]: "SPI channel not 0-1",
  [-77]: "Bad flags",
  [-78]: "SPI speed not 32K-125M",
  [-79]: "Serial device not /dev/tty*",
  [-80]: "Bad serial baud rate",
  [-81]: "Bad parameter",
  [-84]: "Bad SPI count",
};

/** Readable message for a daemon result code. */
export function describeDaemonError(code: number): string {
  return Object.hasOwn(DAEMON_ERROR_CODES, code)
    ? DAEMON_ERROR_CODES[code]
    : `Unknown daemon error ${code}`;
}

/** Base error class for pigpio client errors. */
export class PigpioError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PigpioError";
  }
}

/** Socket-level failure: refused connect, failed write, premature close. */
export class ConnectionError extends PigpioError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/** Malformed or unexpected frame; the byte stream can no longer be trusted. */
export class ProtocolError extends PigpioError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Protocol error: ${message}`, options);
    this.name = "ProtocolError";
  }
}

/** Negative daemon result for a well-formed request. */
export class DaemonError extends PigpioError {
  constructor(public readonly code: number) {
    super(`${describeDaemonError(code)} (code: ${code})`);
    this.name = "DaemonError";
  }
}

/** Sensor frame that failed its checksum or could not be interpreted. */
export class DecodeError extends PigpioError {
  constructor(message: string) {
    super(`Decode error: ${message}`);
    this.name = "DecodeError";
  }
}

/** Normalise an unknown thrown value into an `Error`. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Turn a negative daemon result into a {@link DaemonError}, for callers
 * that cannot continue without success.
 */
export function requireSuccess(
  result: Result<number, PigpioError>,
): Result<number, PigpioError> {
  if (isErr(result)) return result;
  const code = unwrapOk(result);
  return code < 0 ? createErr(new DaemonError(code)) : result;
}
