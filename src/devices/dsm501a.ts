/**
 * DSM501A dust sensor: particle concentration from the share of time its
 * output spends low during a sampling window.
 */
import { setTimeout as sleep } from "node:timers/promises";
import { createOk, isErr, type Result } from "option-t/plain_result";
import { Edge, Level, MAX_WATCHDOG_MS, Mode } from "../commands.ts";
import { type PigpioError, requireSuccess } from "../errors.ts";
import { type Logger, silentLogger } from "../logger.ts";
import type { Pi } from "../pi.ts";
import { tickDiff } from "../utils/tick.ts";
import { assertGpio } from "../utils/validation.ts";

/** Particles counted at 100% low occupancy over 30 s. */
const FULL_SCALE_PCS = 15_000;
/** Cubic metres per 0.01 cubic foot sampled by the sensor. */
const SAMPLE_VOLUME_M3 = 0.02831685;

/** An observed level change. */
export interface LevelChange {
  level: 0 | 1;
  tick: number;
}

/**
 * Total microseconds spent low: for every rising edge, the time since the
 * edge before it.
 */
export function lowPulseMicros(edges: readonly LevelChange[]): number {
  let total = 0;
  for (let i = 1; i < edges.length; i++) {
    if (edges[i].level === Level.HIGH) {
      total += tickDiff(edges[i - 1].tick, edges[i].tick);
    }
  }
  return total;
}

/**
 * Particles per cubic metre for `lowMicros` of low output observed over
 * `elapsedSeconds` of a `sampleSeconds` window.
 */
export function computeConcentration(
  lowMicros: number,
  elapsedSeconds: number,
  sampleSeconds: number,
): number {
  if (elapsedSeconds <= 0) return 0;
  const ratio = ((lowMicros / 1_000_000) * 100) / elapsedSeconds;
  const maxPcs = FULL_SCALE_PCS * (sampleSeconds / 30);
  return ((maxPcs * ratio) / 100) * (1 / SAMPLE_VOLUME_M3);
}

/** The parts of a connection the sensor uses. */
export type Dsm501aHost = Pick<
  Pi,
  "callback" | "cancelCallback" | "setMode" | "setWatchdog"
>;

export interface Dsm501aOptions {
  logger?: Logger;
  /** Millisecond clock used to measure the window. */
  now?: () => number;
}

export class Dsm501a {
  readonly #host: Dsm501aHost;
  readonly #gpio: number;
  readonly #logger: Logger;
  readonly #now: () => number;

  constructor(host: Dsm501aHost, gpio: number, options: Dsm501aOptions = {}) {
    assertGpio(gpio);
    this.#host = host;
    this.#gpio = gpio;
    this.#logger = options.logger ?? silentLogger;
    this.#now = options.now ?? (() => performance.now());
  }

  get gpio(): number {
    return this.#gpio;
  }

  /**
   * Watch the output for `seconds` and return the average concentration
   * in particles per cubic metre.
   *
   * @throws RangeError when `seconds` is not positive.
   */
  sample(seconds = 30): Promise<Result<number, PigpioError>> {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new RangeError(`seconds must be positive, got ${seconds}`);
    }
    return this.#sample(seconds);
  }

  async #sample(seconds: number): Promise<Result<number, PigpioError>> {
    const edges: LevelChange[] = [];
    const input = requireSuccess(
      await this.#host.setMode(this.#gpio, Mode.INPUT),
    );
    if (isErr(input)) return input;

    const subscribed = requireSuccess(
      await this.#host.callback(this.#gpio, Edge.EITHER, ({ level, tick }) => {
        if (level !== Level.TIMEOUT) edges.push({ level, tick });
      }),
    );
    if (isErr(subscribed)) return subscribed;

    const started = this.#now();
    const windowMs = seconds * 1000;
    // Keeps the notification stream reporting while the pin is idle.
    const armed = await this.#host.setWatchdog(
      this.#gpio,
      Math.min(Math.ceil(windowMs), MAX_WATCHDOG_MS),
    );
    if (isErr(armed)) {
      await this.#release();
      return armed;
    }

    await sleep(windowMs);
    const elapsed = (this.#now() - started) / 1000;
    await this.#release();

    const low = lowPulseMicros(edges);
    this.#logger.debug(
      `dsm501a GPIO ${this.#gpio}: ${edges.length} edges, ${low} us low in ${elapsed.toFixed(2)} s`,
    );
    return createOk(computeConcentration(low, elapsed, seconds));
  }

  async #release(): Promise<void> {
    const cleared = await this.#host.setWatchdog(this.#gpio, 0);
    if (isErr(cleared)) {
      this.#logger.warn(`dsm501a: watchdog not cleared: ${cleared.err.message}`);
    }
    const cancelled = await this.#host.cancelCallback(this.#gpio);
    if (isErr(cancelled)) {
      this.#logger.warn(
        `dsm501a: callback not cancelled: ${cancelled.err.message}`,
      );
    }
  }
}
