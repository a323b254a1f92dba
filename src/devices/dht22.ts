/**
 * DHT22 temperature / humidity sensor on one GPIO.
 *
 * The sensor answers a start pulse with a 40-bit frame: humidity high and
 * low byte, temperature high and low byte, checksum. Each bit is a low
 * phase followed by a high phase whose length encodes the value, so the
 * decoder only needs either-edge callbacks and their ticks.
 */
import { setTimeout as sleep } from "node:timers/promises";
import {
  createErr,
  createOk,
  isErr,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { Edge, type EventLevel, Level, Mode } from "../commands.ts";
import { DecodeError, type PigpioError, requireSuccess } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import type { CallbackEvent } from "../notifications.ts";
import type { DaemonResult, Pi } from "../pi.ts";
import { tickDiff } from "../utils/tick.ts";
import { assertGpio } from "../utils/validation.ts";

/** High phase (µs) at or above which a bit reads as 1. */
export const ONE_BIT_MIN_US = 50;
/** High phase (µs) at or above which the frame is corrupt. */
export const BAD_BIT_MIN_US = 200;
/** Rising edges further apart than this (µs) start a new frame. */
export const STALE_FRAME_US = 250_000;

const HEADER_BITS = -2;
const FRAME_BITS = 40;
const BAD_CHECKSUM = 256;

/** One decoded frame. */
export interface Dht22Reading {
  /** Degrees Celsius. */
  temperature: number;
  /** Relative humidity, percent. */
  humidity: number;
  timestamp: Date;
}

/** Frame outcome: `Ok` for a good checksum, `Err` for a bad one. */
export type FrameResult = Result<Dht22Reading, DecodeError>;

/**
 * Edge-timing state machine for one sensor.
 *
 * The bit counter starts at -2 to skip the sensor's two response pulses;
 * 0-7 fill humidity high, 8-15 humidity low, 16-23 temperature high,
 * 24-31 temperature low and 32-39 the checksum.
 */
export class Dht22Decoder {
  #bit = HEADER_BITS;
  #humidityHigh = 0;
  #humidityLow = 0;
  #temperatureHigh = 0;
  #temperatureLow = 0;
  #checksum = 0;
  #highTick = 0;
  #temperature: number | null = null;
  #humidity: number | null = null;
  #lastRead: Date | null = null;
  #invalidReads = 0;
  readonly #now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.#now = now;
  }

  /** Position in the frame; negative while in the header. */
  get bit(): number {
    return this.#bit;
  }

  get temperature(): number | null {
    return this.#temperature;
  }

  get humidity(): number | null {
    return this.#humidity;
  }

  get lastRead(): Date | null {
    return this.#lastRead;
  }

  get invalidReads(): number {
    return this.#invalidReads;
  }

  /** Forget the frame in progress. Last good values are kept. */
  reset(): void {
    this.#bit = HEADER_BITS;
    this.#humidityHigh = 0;
    this.#humidityLow = 0;
    this.#temperatureHigh = 0;
    this.#temperatureLow = 0;
    this.#checksum = 0;
  }

  /**
   * Feed one edge. Returns the frame outcome when this edge completed a
   * frame, otherwise `undefined`. Watchdog timeouts are ignored.
   */
  feed(level: EventLevel, tick: number): FrameResult | undefined {
    const diff = tickDiff(this.#highTick, tick);
    if (level === Level.HIGH) {
      this.#highTick = tick;
      if (diff > STALE_FRAME_US) this.reset();
      return undefined;
    }
    if (level !== Level.LOW) return undefined;

    const value = diff >= ONE_BIT_MIN_US ? 1 : 0;
    if (diff >= BAD_BIT_MIN_US) this.#checksum = BAD_CHECKSUM;

    const bit = this.#bit;
    let outcome: FrameResult | undefined;
    if (bit >= FRAME_BITS) {
      // Complete; trailing edges are ignored.
    } else if (bit >= 32) {
      this.#checksum = (this.#checksum << 1) + value;
      if (bit === FRAME_BITS - 1) outcome = this.#complete();
    } else if (bit >= 24) {
      this.#temperatureLow = (this.#temperatureLow << 1) + value;
    } else if (bit >= 16) {
      this.#temperatureHigh = (this.#temperatureHigh << 1) + value;
    } else if (bit >= 8) {
      this.#humidityLow = (this.#humidityLow << 1) + value;
    } else if (bit >= 0) {
      this.#humidityHigh = (this.#humidityHigh << 1) + value;
    }

    if (outcome && !isErr(outcome)) {
      this.reset();
    } else {
      this.#bit = Math.min(bit + 1, FRAME_BITS);
    }
    return outcome;
  }

  #complete(): FrameResult {
    const total =
      this.#humidityHigh +
      this.#humidityLow +
      this.#temperatureHigh +
      this.#temperatureLow;
    if ((total & 0xff) !== this.#checksum) {
      this.#invalidReads++;
      return createErr(
        new DecodeError(
          `checksum ${this.#checksum} does not match ${total & 0xff}`,
        ),
      );
    }
    const humidity = ((this.#humidityHigh << 8) | this.#humidityLow) / 10;
    const magnitude =
      (((this.#temperatureHigh & 0x7f) << 8) | this.#temperatureLow) / 10;
    const temperature = this.#temperatureHigh & 0x80 ? -magnitude : magnitude;
    const timestamp = this.#now();
    this.#humidity = humidity;
    this.#temperature = temperature;
    this.#lastRead = timestamp;
    return createOk({ humidity, temperature, timestamp });
  }
}

/** The parts of a connection the sensor uses. */
export type Dht22Host = Pick<Pi, "callback" | "cancelCallback" | "setMode" | "write">;

export interface Dht22Options {
  /** Length of the start pulse (ms). */
  startPulseMs?: number;
  logger?: Logger;
  now?: () => Date;
}

/** Events emitted by {@link Dht22}. */
export type Dht22EventMap = {
  reading: CustomEvent<Dht22Reading>;
  invalid: CustomEvent<DecodeError>;
};

/**
 * A sensor bound to one pin. Call {@link start} once, then {@link trigger}
 * for each measurement; results arrive asynchronously through the
 * accessors and the `reading` / `invalid` events.
 *
 * The sensor may stop answering if triggered more often than every few
 * seconds.
 */
export class Dht22 {
  readonly #host: Dht22Host;
  readonly #gpio: number;
  readonly #decoder: Dht22Decoder;
  readonly #startPulseMs: number;
  readonly #logger: Logger;
  readonly #target = new EventTarget();

  constructor(host: Dht22Host, gpio: number, options: Dht22Options = {}) {
    assertGpio(gpio);
    this.#host = host;
    this.#gpio = gpio;
    this.#decoder = new Dht22Decoder(options.now);
    this.#startPulseMs = options.startPulseMs ?? 17;
    this.#logger = options.logger ?? silentLogger;
  }

  get gpio(): number {
    return this.#gpio;
  }

  /** Listen for edges on the data pin. */
  start(): DaemonResult {
    return this.#host.callback(this.#gpio, Edge.EITHER, (event) =>
      this.#onEdge(event),
    );
  }

  /** Stop listening. */
  stop(): DaemonResult {
    return this.#host.cancelCallback(this.#gpio);
  }

  /** Last good temperature (°C), or null before the first frame. */
  temperature(): number | null {
    return this.#decoder.temperature;
  }

  /** Last good relative humidity (%), or null before the first frame. */
  humidity(): number | null {
    return this.#decoder.humidity;
  }

  /** Time of the last good frame. */
  lastRead(): Date | null {
    return this.#decoder.lastRead;
  }

  /** Frames rejected by the checksum. */
  invalidReads(): number {
    return this.#decoder.invalidReads;
  }

  /**
   * Ask the sensor for a frame: drive the pin low for the start pulse, then
   * release it. Resolves once the pin is back to input; the frame follows.
   */
  async trigger(): Promise<Result<void, PigpioError>> {
    this.#decoder.reset();
    const output = await this.#check(this.#host.setMode(this.#gpio, Mode.OUTPUT));
    if (isErr(output)) return output;
    const low = await this.#check(this.#host.write(this.#gpio, Level.LOW));
    if (isErr(low)) return low;
    await sleep(this.#startPulseMs);
    return this.#check(this.#host.setMode(this.#gpio, Mode.INPUT));
  }

  addEventListener<K extends keyof Dht22EventMap>(
    type: K,
    listener: (ev: Dht22EventMap[K]) => void,
    options?: AddEventListenerOptions,
  ): void {
    this.#target.addEventListener(type, listener as EventListener, options);
  }

  removeEventListener<K extends keyof Dht22EventMap>(
    type: K,
    listener: (ev: Dht22EventMap[K]) => void,
  ): void {
    this.#target.removeEventListener(type, listener as EventListener);
  }

  async #check(pending: DaemonResult): Promise<Result<void, PigpioError>> {
    const result = requireSuccess(await pending);
    return isErr(result) ? result : createOk(undefined);
  }

  #onEdge(event: CallbackEvent): void {
    const outcome = this.#decoder.feed(event.level, event.tick);
    if (!outcome) return;
    if (isErr(outcome)) {
      this.#logger.debug(`dht22 GPIO ${this.#gpio}: ${outcome.err.message}`);
      this.#target.dispatchEvent(new CustomEvent("invalid", { detail: outcome.err }));
      return;
    }
    this.#target.dispatchEvent(new CustomEvent("reading", { detail: unwrapOk(outcome) }));
  }
}
