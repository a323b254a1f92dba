/**
 * Digital output helpers: a pin driven high or low, and the switch / LED
 * wrappers built on it.
 */
import { createOk, isErr, type Result, unwrapOk } from "option-t/plain_result";
import { type DigitalLevel, Level, Mode } from "../commands.ts";
import { type PigpioError, requireSuccess } from "../errors.ts";
import type { Pi } from "../pi.ts";
import { assertPin } from "../utils/validation.ts";

/** The parts of a connection an output uses. */
export type OutputHost = Pick<Pi, "setMode" | "write" | "read">;

function done(result: Result<number, PigpioError>): Result<void, PigpioError> {
  const checked = requireSuccess(result);
  return isErr(checked) ? checked : createOk(undefined);
}

/** One GPIO configured as an output. */
export class DigitalOutput {
  constructor(
    private readonly host: OutputHost,
    readonly gpio: number,
  ) {
    assertPin(gpio);
  }

  /** Put the pin in output mode. */
  async init(): Promise<Result<void, PigpioError>> {
    return done(await this.host.setMode(this.gpio, Mode.OUTPUT));
  }

  async setOutput(level: DigitalLevel): Promise<Result<void, PigpioError>> {
    return done(await this.host.write(this.gpio, level));
  }

  /** Level the pin currently reads. */
  async level(): Promise<Result<DigitalLevel, PigpioError>> {
    const result = requireSuccess(await this.host.read(this.gpio));
    if (isErr(result)) return result;
    return createOk(unwrapOk(result) === 0 ? Level.LOW : Level.HIGH);
  }
}

/** On/off control of a load behind a digital output. */
export class Switch {
  constructor(readonly output: DigitalOutput) {}

  /** Build a switch on `gpio` and set the pin to output. */
  static async create(
    host: OutputHost,
    gpio: number,
  ): Promise<Result<Switch, PigpioError>> {
    const output = new DigitalOutput(host, gpio);
    const ready = await output.init();
    return isErr(ready) ? ready : createOk(new Switch(output));
  }

  on(): Promise<Result<void, PigpioError>> {
    return this.output.setOutput(Level.HIGH);
  }

  off(): Promise<Result<void, PigpioError>> {
    return this.output.setOutput(Level.LOW);
  }

  /** True when the pin reads high. */
  async status(): Promise<Result<boolean, PigpioError>> {
    const level = await this.output.level();
    return isErr(level) ? level : createOk(unwrapOk(level) === Level.HIGH);
  }
}

/** An LED on a GPIO (anode side). */
export class Led {
  constructor(readonly power: Switch) {}

  static async create(
    host: OutputHost,
    gpio: number,
  ): Promise<Result<Led, PigpioError>> {
    const power = await Switch.create(host, gpio);
    return isErr(power) ? power : createOk(new Led(unwrapOk(power)));
  }

  on(): Promise<Result<void, PigpioError>> {
    return this.power.on();
  }

  off(): Promise<Result<void, PigpioError>> {
    return this.power.off();
  }

  status(): Promise<Result<boolean, PigpioError>> {
    return this.power.status();
  }

  /** Invert the current state. */
  async toggle(): Promise<Result<boolean, PigpioError>> {
    const lit = await this.status();
    if (isErr(lit)) return lit;
    const next = !unwrapOk(lit);
    const set = await (next ? this.on() : this.off());
    return isErr(set) ? set : createOk(next);
  }
}
