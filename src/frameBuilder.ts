/**
 * Pure functions for building daemon frames.
 *
 * Every request starts with a 16-byte header of four little-endian uint32
 * fields: command, p1, p2 and the length of the payload that follows.
 * Simple commands carry no payload; extended commands append it directly
 * after the header.
 */

import { assertBytes, assertUint32 } from "./utils/validation.ts";

/** Size of a command header and of every response. */
export const COMMAND_HEADER_SIZE = 16;
/** Size of one notification record. */
export const NOTIFICATION_SIZE = 12;

function writeHeader(
  view: DataView,
  command: number,
  p1: number,
  p2: number,
  extLength: number,
): void {
  view.setUint32(0, command, true);
  view.setUint32(4, p1, true);
  view.setUint32(8, p2, true);
  view.setUint32(12, extLength, true);
}

function validateHeaderFields(command: number, p1: number, p2: number): void {
  assertUint32("command", command);
  assertUint32("p1", p1);
  assertUint32("p2", p2);
}

/**
 * Build a simple (payload-less) command frame.
 *
 * @returns 16 bytes: `[command, p1, p2, 0]` as uint32 LE.
 * @throws RangeError when a field does not fit an unsigned 32-bit integer.
 */
export function encodeCommand(
  command: number,
  p1: number,
  p2: number,
): Uint8Array {
  validateHeaderFields(command, p1, p2);
  const frame = new Uint8Array(COMMAND_HEADER_SIZE);
  writeHeader(new DataView(frame.buffer), command, p1, p2, 0);
  return frame;
}

/**
 * Build an extended command frame: header followed by `payload`.
 *
 * The length field always equals `payload.length`, and the payload is
 * placed in the same buffer so a single write sends both in order.
 */
export function encodeExtended(
  command: number,
  p1: number,
  p2: number,
  payload: Uint8Array,
): Uint8Array {
  validateHeaderFields(command, p1, p2);
  assertBytes("payload", payload);
  const frame = new Uint8Array(COMMAND_HEADER_SIZE + payload.length);
  writeHeader(new DataView(frame.buffer), command, p1, p2, payload.length);
  frame.set(payload, COMMAND_HEADER_SIZE);
  return frame;
}

/** Concatenate uint32 words as little-endian bytes. */
export function packWords(words: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(words.length * 4);
  const view = new DataView(bytes.buffer);
  words.forEach((word, i) => {
    assertUint32(`word[${i}]`, word);
    view.setUint32(i * 4, word, true);
  });
  return bytes;
}

/**
 * Build a response frame as the daemon sends it (echo + signed result).
 * Used by in-memory transports and tests.
 */
export function encodeResponse(
  command: number,
  p1: number,
  p2: number,
  result: number,
): Uint8Array {
  const frame = new Uint8Array(COMMAND_HEADER_SIZE);
  const view = new DataView(frame.buffer);
  view.setUint32(0, command >>> 0, true);
  view.setUint32(4, p1 >>> 0, true);
  view.setUint32(8, p2 >>> 0, true);
  view.setInt32(12, result | 0, true);
  return frame;
}

/** Fields of one notification record. */
export interface NotificationRecord {
  /** Sequence number (wraps at 2^16). */
  seq: number;
  /** Flag bits, see `NotifyFlag`. */
  flags: number;
  /** Daemon tick in microseconds (wraps at 2^32). */
  tick: number;
  /** Current level of GPIO 0-31, one bit each. */
  level: number;
}

/** Serialize a notification record (daemon side). */
export function encodeNotification(record: NotificationRecord): Uint8Array {
  const bytes = new Uint8Array(NOTIFICATION_SIZE);
  const view = new DataView(bytes.buffer);
  view.setUint16(0, record.seq & 0xffff, true);
  view.setUint16(2, record.flags & 0xffff, true);
  view.setUint32(4, record.tick >>> 0, true);
  view.setUint32(8, record.level >>> 0, true);
  return bytes;
}
