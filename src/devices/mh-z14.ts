/**
 * MH-Z14 CO2 sensor read over a serial port.
 */
import { setTimeout as sleep } from "node:timers/promises";
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { DecodeError, type PigpioError, requireSuccess } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import type { Pi } from "../pi.ts";

export const MH_Z14_BAUD = 9600;
export const MH_Z14_FRAME_SIZE = 9;
const READ_CO2 = 0x86;

/** Checksum over bytes 1-7 of a frame. */
export function mhZ14Checksum(frame: Uint8Array): number {
  let sum = 0;
  for (let i = 1; i < MH_Z14_FRAME_SIZE - 1; i++) sum += frame[i] ?? 0;
  return (0xff - (sum & 0xff) + 1) & 0xff;
}

/** Request frame asking for the gas concentration. */
export function readCo2Command(): Uint8Array {
  const frame = Uint8Array.of(0xff, 0x01, READ_CO2, 0, 0, 0, 0, 0, 0);
  frame[MH_Z14_FRAME_SIZE - 1] = mhZ14Checksum(frame);
  return frame;
}

/** CO2 concentration (ppm) from a response frame. */
export function parseCo2Response(frame: Uint8Array): Result<number, DecodeError> {
  if (frame.length !== MH_Z14_FRAME_SIZE) {
    return createErr(
      new DecodeError(`expected ${MH_Z14_FRAME_SIZE} bytes, got ${frame.length}`),
    );
  }
  if (frame[0] !== 0xff || frame[1] !== READ_CO2) {
    return createErr(new DecodeError("not a gas concentration response"));
  }
  const checksum = mhZ14Checksum(frame);
  if (frame[8] !== checksum) {
    return createErr(
      new DecodeError(`checksum ${frame[8]} does not match ${checksum}`),
    );
  }
  return createOk(frame[2] * 256 + frame[3]);
}

/** The parts of a connection the sensor uses. */
export type MhZ14Host = Pick<
  Pi,
  "serialOpen" | "serialClose" | "serialWrite" | "serialRead" | "serialDataAvailable"
>;

export interface MhZ14Options {
  /** Wait between data-available polls (ms). */
  pollIntervalMs?: number;
  /** Polls before giving up on a response. */
  maxPolls?: number;
  logger?: Logger;
}

export class MhZ14 {
  readonly #host: MhZ14Host;
  readonly #tty: string;
  readonly #pollIntervalMs: number;
  readonly #maxPolls: number;
  readonly #logger: Logger;

  constructor(host: MhZ14Host, tty: string, options: MhZ14Options = {}) {
    if (typeof tty !== "string" || tty.length === 0) {
      throw new TypeError("tty must be a non-empty string");
    }
    this.#host = host;
    this.#tty = tty;
    this.#pollIntervalMs = options.pollIntervalMs ?? 1;
    this.#maxPolls = options.maxPolls ?? 100;
    this.#logger = options.logger ?? silentLogger;
  }

  /** Read the CO2 concentration in ppm. The port is closed afterwards. */
  async read(): Promise<Result<number, PigpioError>> {
    const opened = requireSuccess(
      await this.#host.serialOpen(this.#tty, MH_Z14_BAUD),
    );
    if (isErr(opened)) return opened;
    const handle = unwrapOk(opened);
    try {
      return await this.#query(handle);
    } finally {
      const closed = await this.#host.serialClose(handle);
      if (isErr(closed)) {
        this.#logger.warn(`mh-z14: close failed: ${closed.err.message}`);
      }
    }
  }

  async #query(handle: number): Promise<Result<number, PigpioError>> {
    const written = requireSuccess(
      await this.#host.serialWrite(handle, readCo2Command()),
    );
    if (isErr(written)) return written;

    for (let poll = 0; poll < this.#maxPolls; poll++) {
      const available = requireSuccess(
        await this.#host.serialDataAvailable(handle),
      );
      if (isErr(available)) return available;
      if (unwrapOk(available) >= MH_Z14_FRAME_SIZE) {
        const response = await this.#host.serialRead(handle, MH_Z14_FRAME_SIZE);
        if (isErr(response)) return response;
        const { result, data } = unwrapOk(response);
        const checked = requireSuccess(createOk(result));
        if (isErr(checked)) return checked;
        return parseCo2Response(data);
      }
      await sleep(this.#pollIntervalMs);
    }
    return createErr(
      new DecodeError(`no response on ${this.#tty} after ${this.#maxPolls} polls`),
    );
  }
}
