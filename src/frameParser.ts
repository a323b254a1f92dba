/**
 * Pure functions for parsing daemon frames and notification records.
 */

import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { ProtocolError } from "./errors.ts";
import {
  COMMAND_HEADER_SIZE,
  NOTIFICATION_SIZE,
  type NotificationRecord,
} from "./frameBuilder.ts";

/**
 * Parsed response shape.
 */
export interface ResponseFrame {
  /** Echo of the command code. */
  command: number;
  /** Echo of p1. */
  p1: number;
  /** Echo of p2. */
  p2: number;
  /** Signed result; negative values are daemon error codes. */
  result: number;
}

/** Parsed request header (what the daemon sees). */
export interface CommandHeader {
  command: number;
  p1: number;
  p2: number;
  /** Number of payload bytes following the header. */
  extLength: number;
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function checkLength(
  bytes: Uint8Array,
  expected: number,
  what: string,
): Result<DataView, ProtocolError> {
  if (bytes.length !== expected) {
    return createErr(
      new ProtocolError(
        `${what} must be ${expected} bytes, got ${bytes.length}`,
      ),
    );
  }
  return createOk(viewOf(bytes));
}

/**
 * Parse a 16-byte response frame.
 *
 * The first 12 bytes echo the request; the last 4 are the result as a
 * signed little-endian int32.
 */
export function parseResponse(
  bytes: Uint8Array,
): Result<ResponseFrame, ProtocolError> {
  const checked = checkLength(bytes, COMMAND_HEADER_SIZE, "Response");
  if (isErr(checked)) return checked;
  const view = unwrapOk(checked);
  return createOk({
    command: view.getUint32(0, true),
    p1: view.getUint32(4, true),
    p2: view.getUint32(8, true),
    result: view.getInt32(12, true),
  });
}

/**
 * Decode only the result of a response. Negative values are daemon error
 * codes and are returned as-is.
 */
export function decodeResponse(
  bytes: Uint8Array,
): Result<number, ProtocolError> {
  const parsed = parseResponse(bytes);
  if (isErr(parsed)) return parsed;
  return createOk(unwrapOk(parsed).result);
}

/** Parse the 16-byte header of a request. */
export function parseCommandHeader(
  bytes: Uint8Array,
): Result<CommandHeader, ProtocolError> {
  if (bytes.length < COMMAND_HEADER_SIZE) {
    return createErr(
      new ProtocolError(
        `Command header must be ${COMMAND_HEADER_SIZE} bytes, got ${bytes.length}`,
      ),
    );
  }
  const view = viewOf(bytes);
  return createOk({
    command: view.getUint32(0, true),
    extLength: view.getUint32(12, true),
    p1: view.getUint32(4, true),
    p2: view.getUint32(8, true),
  });
}

/** Parse one 12-byte notification record. */
export function parseNotification(
  bytes: Uint8Array,
): Result<NotificationRecord, ProtocolError> {
  const checked = checkLength(bytes, NOTIFICATION_SIZE, "Notification");
  if (isErr(checked)) return checked;
  const view = unwrapOk(checked);
  return createOk({
    flags: view.getUint16(2, true),
    level: view.getUint32(8, true),
    seq: view.getUint16(0, true),
    tick: view.getUint32(4, true),
  });
}
